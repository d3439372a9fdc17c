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
import {
	buildPatchFromData,
	Db,
	executeConditional,
	executeQuery,
	executeVersionedUpdate,
	fetchOne,
} from '@platewatch/api/src/database/Cassandra';
import type {UserByFirebaseUidRow, UserRow} from '@platewatch/api/src/database/types/UserTypes';
import {USER_COLUMNS} from '@platewatch/api/src/database/types/UserTypes';
import {Logger} from '@platewatch/api/src/Logger';
import {type ReputationState, User} from '@platewatch/api/src/models/User';
import {Users, UsersByEmail, UsersByFirebaseUid} from '@platewatch/api/src/Tables';
import {IUserRepository, type UserCreateData, type UserProfileUpdate} from '@platewatch/api/src/user/IUserRepository';
import {createInitialUserRow, reputationToRowFields} from '@platewatch/api/src/user/UserRows';
import {ValidationErrorCodes} from '@platewatch/constants/src/ValidationErrorCodes';
import {InputValidationError} from '@platewatch/errors/src/domains/core/InputValidationError';
import {PersistenceError} from '@platewatch/errors/src/domains/core/PersistenceError';
import {UnknownUserError} from '@platewatch/errors/src/domains/user/UnknownUserError';

const FETCH_USER_BY_ID_CQL = Users.selectCql({
	where: Users.where.eq('user_id'),
	limit: 1,
});

const FETCH_USER_ID_BY_FIREBASE_UID_CQL = UsersByFirebaseUid.selectCql({
	columns: ['user_id'],
	where: UsersByFirebaseUid.where.eq('firebase_uid'),
	limit: 1,
});

export class UserRepository extends IUserRepository {
	async findUnique(userId: UserID): Promise<User | null> {
		const row = await fetchOne<UserRow>(FETCH_USER_BY_ID_CQL, {user_id: userId});
		return row ? new User(row) : null;
	}

	async findByFirebaseUid(firebaseUid: string): Promise<User | null> {
		const lookup = await fetchOne<Pick<UserByFirebaseUidRow, 'user_id'>>(FETCH_USER_ID_BY_FIREBASE_UID_CQL, {
			firebase_uid: firebaseUid,
		});
		return lookup ? this.findUnique(lookup.user_id) : null;
	}

	async create(data: UserCreateData): Promise<{created: boolean; user: User}> {
		const userId = generateUserID();

		const uidClaim = await executeConditional(
			UsersByFirebaseUid.insertIfNotExists({firebase_uid: data.firebaseUid, user_id: userId}),
		);
		if (!uidClaim.applied) {
			const existing = await this.findByFirebaseUid(data.firebaseUid);
			if (existing) {
				return {created: false, user: existing};
			}
			throw new PersistenceError('user registration');
		}

		const emailClaim = await executeConditional(UsersByEmail.insertIfNotExists({email: data.email, user_id: userId}));
		if (!emailClaim.applied) {
			await executeQuery(UsersByFirebaseUid.deleteByPk({firebase_uid: data.firebaseUid}));
			throw InputValidationError.fromCode('email', ValidationErrorCodes.EMAIL_ALREADY_REGISTERED);
		}

		const row = createInitialUserRow(userId, data);
		await executeQuery(Users.insert(row));
		Logger.info({userId}, 'Registered new user');
		return {created: true, user: new User(row)};
	}

	async updateProfile(userId: UserID, update: UserProfileUpdate): Promise<User> {
		await executeQuery(
			Users.patchByPk(
				{user_id: userId},
				{
					display_name: update.displayName === null ? Db.clear() : Db.set(update.displayName),
					photo_url: update.photoUrl === null ? Db.clear() : Db.set(update.photoUrl),
					last_login_at: Db.set(update.lastLoginAt),
					updated_at: Db.set(update.lastLoginAt),
				},
			),
		);
		const user = await this.findUnique(userId);
		if (!user) throw new UnknownUserError();
		return user;
	}

	async applyReputationUpdate(
		userId: UserID,
		update: (current: ReputationState) => ReputationState,
	): Promise<User> {
		await executeVersionedUpdate<UserRow, 'user_id'>(
			() => fetchOne<UserRow>(FETCH_USER_BY_ID_CQL, {user_id: userId}),
			(current) => {
				if (!current) throw new UnknownUserError();
				const next: UserRow = {
					...current,
					...reputationToRowFields(update(new User(current).reputation)),
					updated_at: new Date(),
				};
				return {
					pk: {user_id: userId},
					patch: buildPatchFromData(next, current, USER_COLUMNS, ['user_id']),
				};
			},
			Users,
		);

		const user = await this.findUnique(userId);
		if (!user) throw new UnknownUserError();
		return user;
	}
}
