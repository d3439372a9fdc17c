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

import {generateUserID, type UserID} from '@platewatch/api/src/BrandedTypes';
import type {UserRow} from '@platewatch/api/src/database/types/UserTypes';
import {type ReputationState, User} from '@platewatch/api/src/models/User';
import {IUserRepository, type UserCreateData, type UserProfileUpdate} from '@platewatch/api/src/user/IUserRepository';
import {createInitialUserRow, reputationToRowFields} from '@platewatch/api/src/user/UserRows';
import {ValidationErrorCodes} from '@platewatch/constants/src/ValidationErrorCodes';
import {InputValidationError} from '@platewatch/errors/src/domains/core/InputValidationError';
import {UnknownUserError} from '@platewatch/errors/src/domains/user/UnknownUserError';

export class InMemoryUserRepository extends IUserRepository {
	private readonly rows = new Map<UserID, UserRow>();
	private readonly byFirebaseUid = new Map<string, UserID>();
	private readonly byEmail = new Map<string, UserID>();
	failNextReputationUpdate: Error | null = null;

	async findUnique(userId: UserID): Promise<User | null> {
		const row = this.rows.get(userId);
		return row ? new User(row) : null;
	}

	async findByFirebaseUid(firebaseUid: string): Promise<User | null> {
		const userId = this.byFirebaseUid.get(firebaseUid);
		return userId ? this.findUnique(userId) : null;
	}

	async create(data: UserCreateData): Promise<{created: boolean; user: User}> {
		const existingId = this.byFirebaseUid.get(data.firebaseUid);
		const existing = existingId ? this.rows.get(existingId) : undefined;
		if (existing) {
			return {created: false, user: new User(existing)};
		}
		if (this.byEmail.has(data.email)) {
			throw InputValidationError.fromCode('email', ValidationErrorCodes.EMAIL_ALREADY_REGISTERED);
		}
		const row = createInitialUserRow(generateUserID(), data);
		this.store(row);
		return {created: true, user: new User(row)};
	}

	async updateProfile(userId: UserID, update: UserProfileUpdate): Promise<User> {
		const row = this.rows.get(userId);
		if (!row) throw new UnknownUserError();
		const next: UserRow = {
			...row,
			display_name: update.displayName,
			photo_url: update.photoUrl,
			last_login_at: update.lastLoginAt,
			updated_at: update.lastLoginAt,
		};
		this.rows.set(userId, next);
		return new User(next);
	}

	// Read and write happen in one synchronous step, so concurrent callers never interleave.
	async applyReputationUpdate(
		userId: UserID,
		update: (current: ReputationState) => ReputationState,
	): Promise<User> {
		if (this.failNextReputationUpdate) {
			const error = this.failNextReputationUpdate;
			this.failNextReputationUpdate = null;
			throw error;
		}
		const row = this.rows.get(userId);
		if (!row) throw new UnknownUserError();
		const next: UserRow = {
			...row,
			...reputationToRowFields(update(new User(row).reputation)),
			updated_at: new Date(),
			version: row.version + 1,
		};
		this.rows.set(userId, next);
		return new User(next);
	}

	seed(data: Partial<UserRow> & {firebase_uid: string; email: string}): User {
		const createdAt = data.created_at ?? new Date('2026-01-01T00:00:00.000Z');
		const row: UserRow = {
			...createInitialUserRow(data.user_id ?? generateUserID(), {
				firebaseUid: data.firebase_uid,
				email: data.email,
				displayName: data.display_name ?? null,
				photoUrl: data.photo_url ?? null,
				createdAt,
			}),
			...data,
		};
		this.store(row);
		return new User(row);
	}

	private store(row: UserRow): void {
		this.rows.set(row.user_id, row);
		this.byFirebaseUid.set(row.firebase_uid, row.user_id);
		this.byEmail.set(row.email, row.user_id);
	}
}
