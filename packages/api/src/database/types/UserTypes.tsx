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

export interface UserRow {
	user_id: UserID;
	firebase_uid: string;
	email: string;
	display_name: string | null;
	photo_url: string | null;
	total_reports: number;
	approved_reports: number;
	rejected_reports: number;
	reputation_score: number;
	is_banned: boolean;
	ban_reason: string | null;
	created_at: Date;
	updated_at: Date;
	last_login_at: Date | null;
	version: number;
}

export const USER_COLUMNS = [
	'user_id',
	'firebase_uid',
	'email',
	'display_name',
	'photo_url',
	'total_reports',
	'approved_reports',
	'rejected_reports',
	'reputation_score',
	'is_banned',
	'ban_reason',
	'created_at',
	'updated_at',
	'last_login_at',
	'version',
] as const satisfies ReadonlyArray<keyof UserRow>;

export interface UserByFirebaseUidRow {
	firebase_uid: string;
	user_id: UserID;
}

export interface UserByEmailRow {
	email: string;
	user_id: UserID;
}
