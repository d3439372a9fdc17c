/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import type {Actor} from '@platewatch/api/src/identity/Actor';
import type {IIdentityVerifier, VerifiedIdentity} from '@platewatch/api/src/identity/IIdentityVerifier';
import {Logger} from '@platewatch/api/src/Logger';
import type {User} from '@platewatch/api/src/models/User';
import type {IUserRepository} from '@platewatch/api/src/user/IUserRepository';

export interface IdentityRequest {
	authorization: string | null | undefined;
	clientIp: string;
}

export interface ResolvedIdentity {
	actor: Actor;
	identity: VerifiedIdentity | null;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function extractBearerToken(authorization: string | null | undefined): string | null {
	if (!authorization) return null;
	const match = BEARER_PATTERN.exec(authorization.trim());
	return match ? match[1] : null;
}

export class IdentityResolver {
	constructor(
		private readonly verifier: IIdentityVerifier,
		private readonly userRepository: IUserRepository,
	) {}

	/**
	 * Never throws for identity problems: a missing, malformed, invalid or unregistered
	 * identity resolves to the anonymous actor for the client IP, as does a failed user lookup.
	 */
	async resolve(request: IdentityRequest): Promise<Actor> {
		const {actor} = await this.resolveRequest(request);
		return actor;
	}

	/** Like `resolve`, also returning the verified identity when there is one. */
	async resolveRequest(request: IdentityRequest): Promise<ResolvedIdentity> {
		const anonymous: Actor = {kind: 'anonymous', ip: request.clientIp};

		const identity = await this.verifyAuthorization(request.authorization);
		if (!identity) {
			return {actor: anonymous, identity: null};
		}

		let user: User | null;
		try {
			user = await this.userRepository.findByFirebaseUid(identity.uid);
		} catch (error) {
			Logger.warn(
				{uid: identity.uid, error: error instanceof Error ? error.message : String(error)},
				'User lookup failed',
			);
			return {actor: anonymous, identity: null};
		}
		if (!user) {
			Logger.debug({uid: identity.uid}, 'Verified identity has no registered user');
			return {actor: anonymous, identity};
		}

		return {actor: {kind: 'user', user}, identity};
	}

	async verifyAuthorization(authorization: string | null | undefined): Promise<VerifiedIdentity | null> {
		if (!authorization) return null;

		const token = extractBearerToken(authorization);
		if (!token) {
			Logger.warn('Malformed authorization header');
			return null;
		}

		try {
			return await this.verifier.verify(token);
		} catch (error) {
			Logger.warn({error: error instanceof Error ? error.message : String(error)}, 'Identity verifier failed');
			return null;
		}
	}
}
