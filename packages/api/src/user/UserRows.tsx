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
import type {UserRow} from '@platewatch/api/src/database/types/UserTypes';
import type {ReputationState} from '@platewatch/api/src/models/User';
import type {UserCreateData} from '@platewatch/api/src/user/IUserRepository';
import {REPUTATION_INITIAL_SCORE} from '@platewatch/constants/src/ReputationConstants';

export function createInitialUserRow(userId: UserID, data: UserCreateData): UserRow {
	return {
		user_id: userId,
		firebase_uid: data.firebaseUid,
		email: data.email,
		display_name: data.displayName,
		photo_url: data.photoUrl,
		total_reports: 0,
		approved_reports: 0,
		rejected_reports: 0,
		reputation_score: REPUTATION_INITIAL_SCORE,
		is_banned: false,
		ban_reason: null,
		created_at: data.createdAt,
		updated_at: data.createdAt,
		last_login_at: data.createdAt,
		version: 1,
	};
}

export function reputationToRowFields(
	state: ReputationState,
): Pick<
	UserRow,
	'total_reports' | 'approved_reports' | 'rejected_reports' | 'reputation_score' | 'is_banned' | 'ban_reason'
> {
	return {
		total_reports: state.totalReports,
		approved_reports: state.approvedReports,
		rejected_reports: state.rejectedReports,
		reputation_score: state.reputationScore,
		is_banned: state.isBanned,
		ban_reason: state.banReason,
	};
}
