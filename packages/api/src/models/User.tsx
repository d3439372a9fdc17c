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

/** The counters and ban state the reputation engine owns. */
export interface ReputationState {
	totalReports: number;
	approvedReports: number;
	rejectedReports: number;
	reputationScore: number;
	isBanned: boolean;
	banReason: string | null;
}

export class User {
	readonly id: UserID;
	readonly firebaseUid: string;
	readonly email: string;
	readonly displayName: string | null;
	readonly photoUrl: string | null;
	readonly totalReports: number;
	readonly approvedReports: number;
	readonly rejectedReports: number;
	readonly reputationScore: number;
	readonly isBanned: boolean;
	readonly banReason: string | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
	readonly lastLoginAt: Date | null;
	readonly version: number;

	constructor(row: UserRow) {
		this.id = row.user_id;
		this.firebaseUid = row.firebase_uid;
		this.email = row.email;
		this.displayName = row.display_name;
		this.photoUrl = row.photo_url;
		this.totalReports = row.total_reports ?? 0;
		this.approvedReports = row.approved_reports ?? 0;
		this.rejectedReports = row.rejected_reports ?? 0;
		this.reputationScore = row.reputation_score;
		this.isBanned = row.is_banned ?? false;
		this.banReason = row.ban_reason;
		this.createdAt = row.created_at;
		this.updatedAt = row.updated_at;
		this.lastLoginAt = row.last_login_at;
		this.version = row.version;
	}

	get reputation(): ReputationState {
		return {
			totalReports: this.totalReports,
			approvedReports: this.approvedReports,
			rejectedReports: this.rejectedReports,
			reputationScore: this.reputationScore,
			isBanned: this.isBanned,
			banReason: this.banReason,
		};
	}

	toRow(): UserRow {
		return {
			user_id: this.id,
			firebase_uid: this.firebaseUid,
			email: this.email,
			display_name: this.displayName,
			photo_url: this.photoUrl,
			total_reports: this.totalReports,
			approved_reports: this.approvedReports,
			rejected_reports: this.rejectedReports,
			reputation_score: this.reputationScore,
			is_banned: this.isBanned,
			ban_reason: this.banReason,
			created_at: this.createdAt,
			updated_at: this.updatedAt,
			last_login_at: this.lastLoginAt,
			version: this.version,
		};
	}
}
