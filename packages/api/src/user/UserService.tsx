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

import type {VerifiedIdentity} from '@platewatch/api/src/identity/IIdentityVerifier';
import type {User} from '@platewatch/api/src/models/User';
import type {IUserRepository} from '@platewatch/api/src/user/IUserRepository';
import {ValidationErrorCodes} from '@platewatch/constants/src/ValidationErrorCodes';
import {InputValidationError} from '@platewatch/errors/src/domains/core/InputValidationError';

export interface UserRegistration {
	created: boolean;
	user: User;
}

export class UserService {
	private readonly now: () => Date;

	constructor(
		private readonly userRepository: IUserRepository,
		options: {now?: () => Date} = {},
	) {
		this.now = options.now ?? (() => new Date());
	}

	/** Creates the user for a verified identity, or refreshes the profile of an existing one. */
	async register(identity: VerifiedIdentity): Promise<UserRegistration> {
		const now = this.now();
		const existing = await this.userRepository.findByFirebaseUid(identity.uid);
		if (existing) {
			return {created: false, user: await this.refreshProfile(existing, identity, now)};
		}

		if (!identity.email) {
			throw InputValidationError.fromCode('email', ValidationErrorCodes.IDENTITY_EMAIL_MISSING);
		}

		const result = await this.userRepository.create({
			firebaseUid: identity.uid,
			email: identity.email.trim().toLowerCase(),
			displayName: identity.displayName,
			photoUrl: identity.photoUrl,
			createdAt: now,
		});
		if (!result.created) {
			return {created: false, user: await this.refreshProfile(result.user, identity, now)};
		}

		return result;
	}

	private async refreshProfile(user: User, identity: VerifiedIdentity, now: Date): Promise<User> {
		return this.userRepository.updateProfile(user.id, {
			displayName: identity.displayName ?? user.displayName,
			photoUrl: identity.photoUrl ?? user.photoUrl,
			lastLoginAt: now,
		});
	}
}
