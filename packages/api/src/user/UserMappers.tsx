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

import type {User} from '@platewatch/api/src/models/User';
import type {UserPrivateResponse} from '@platewatch/schema/src/domains/user/UserSchemas';

export function mapUserToPrivateResponse(user: User): UserPrivateResponse {
	return {
		id: user.id,
		email: user.email,
		display_name: user.displayName,
		photo_url: user.photoUrl,
		total_reports: user.totalReports,
		approved_reports: user.approvedReports,
		rejected_reports: user.rejectedReports,
		reputation_score: user.reputationScore,
		is_banned: user.isBanned,
		ban_reason: user.banReason,
		created_at: user.createdAt.toISOString(),
		last_login_at: user.lastLoginAt?.toISOString() ?? null,
	};
}
