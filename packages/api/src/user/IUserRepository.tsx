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

import type {UserID} from '@platewatch/api/src/BrandedTypes';
import type {ReputationState, User} from '@platewatch/api/src/models/User';

export interface UserCreateData {
	firebaseUid: string;
	email: string;
	displayName: string | null;
	photoUrl: string | null;
	createdAt: Date;
}

export interface UserProfileUpdate {
	displayName: string | null;
	photoUrl: string | null;
	lastLoginAt: Date;
}

export abstract class IUserRepository {
	abstract findUnique(userId: UserID): Promise<User | null>;

	abstract findByFirebaseUid(firebaseUid: string): Promise<User | null>;

	/** Creates the user unless the identity is already registered, in which case the existing user is returned. */
	abstract create(data: UserCreateData): Promise<{created: boolean; user: User}>;

	abstract updateProfile(userId: UserID, update: UserProfileUpdate): Promise<User>;

	/** Atomic read-modify-write of the reputation fields. */
	abstract applyReputationUpdate(
		userId: UserID,
		update: (current: ReputationState) => ReputationState,
	): Promise<User>;
}
