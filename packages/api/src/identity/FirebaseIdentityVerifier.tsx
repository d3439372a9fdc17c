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

import type {IIdentityVerifier, VerifiedIdentity} from '@platewatch/api/src/identity/IIdentityVerifier';
import {Logger} from '@platewatch/api/src/Logger';
import {type App, cert, getApps, initializeApp} from 'firebase-admin/app';
import {getAuth} from 'firebase-admin/auth';

const FIREBASE_APP_NAME = 'platewatch';

export interface FirebaseCredentials {
	projectId: string;
	clientEmail: string;
	privateKey: string;
}

export class FirebaseIdentityVerifier implements IIdentityVerifier {
	private readonly app: App;

	constructor(credentials: FirebaseCredentials) {
		const existing = getApps().find((app) => app.name === FIREBASE_APP_NAME);
		this.app =
			existing ??
			initializeApp(
				{
					credential: cert({
						projectId: credentials.projectId,
						clientEmail: credentials.clientEmail,
						privateKey: credentials.privateKey.replace(/\\n/g, '\n'),
					}),
					projectId: credentials.projectId,
				},
				FIREBASE_APP_NAME,
			);
	}

	async verify(token: string): Promise<VerifiedIdentity | null> {
		try {
			const decoded = await getAuth(this.app).verifyIdToken(token);
			const name: unknown = decoded['name'];
			return {
				uid: decoded.uid,
				email: decoded.email ?? null,
				displayName: typeof name === 'string' && name.length > 0 ? name : null,
				photoUrl: decoded.picture ?? null,
				emailVerified: decoded.email_verified ?? false,
			};
		} catch (error) {
			Logger.warn({error: error instanceof Error ? error.message : String(error)}, 'Identity token rejected');
			return null;
		}
	}
}

/** Used when no Firebase credentials are configured: every caller is anonymous. */
export class DisabledIdentityVerifier implements IIdentityVerifier {
	async verify(): Promise<VerifiedIdentity | null> {
		return null;
	}
}

export function createIdentityVerifier(config: {
	projectId?: string;
	clientEmail?: string;
	privateKey?: string;
}): IIdentityVerifier {
	if (!config.projectId || !config.clientEmail || !config.privateKey) {
		Logger.warn('Firebase credentials not configured, identity verification disabled');
		return new DisabledIdentityVerifier();
	}
	return new FirebaseIdentityVerifier({
		projectId: config.projectId,
		clientEmail: config.clientEmail,
		privateKey: config.privateKey,
	});
}
