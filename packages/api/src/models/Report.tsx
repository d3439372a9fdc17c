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

import type {ReportID, UserID} from '@platewatch/api/src/BrandedTypes';
import type {ReportRow} from '@platewatch/api/src/database/types/ReportTypes';
import {type ReportStatus, ReportStatuses} from '@platewatch/constants/src/ReportConstants';

export type ReportActorRef = {kind: 'user'; userId: UserID} | {kind: 'anonymous'; ip: string};

export interface ModerationResult {
	approved: boolean;
	reason: string;
	confidence: number;
	flags: ReadonlyArray<string>;
	reviewedAt: Date;
}

export class Report {
	readonly id: ReportID;
	readonly plateNumber: string;
	readonly violations: ReadonlyArray<string>;
	readonly location: string;
	readonly description: string | null;
	readonly photoUrl: string | null;
	readonly actor: ReportActorRef;
	readonly status: ReportStatus;
	readonly moderation: ModerationResult | null;
	readonly reputationRecorded: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;

	constructor(row: ReportRow) {
		this.id = row.report_id;
		this.plateNumber = row.plate_number;
		this.violations = row.violations ?? [];
		this.location = row.location;
		this.description = row.description;
		this.photoUrl = row.photo_url;
		this.actor = row.user_id ? {kind: 'user', userId: row.user_id} : {kind: 'anonymous', ip: row.user_ip ?? 'unknown'};
		this.status = row.status;
		this.moderation =
			row.moderation_reviewed_at && row.moderation_approved !== null
				? {
						approved: row.moderation_approved,
						reason: row.moderation_reason ?? '',
						confidence: row.moderation_confidence ?? 0,
						flags: row.moderation_flags ?? [],
						reviewedAt: row.moderation_reviewed_at,
					}
				: null;
		this.reputationRecorded = row.reputation_recorded ?? false;
		this.createdAt = row.created_at;
		this.updatedAt = row.updated_at;
	}

	get userId(): UserID | null {
		return this.actor.kind === 'user' ? this.actor.userId : null;
	}

	isPending(): boolean {
		return this.status === ReportStatuses.PENDING;
	}

	/** Final, with the reporter's reputation outcome (if any) recorded. */
	isSettled(): boolean {
		return !this.isPending() && (this.actor.kind === 'anonymous' || this.reputationRecorded);
	}

	toRow(): ReportRow {
		return {
			report_id: this.id,
			plate_number: this.plateNumber,
			violations: [...this.violations],
			location: this.location,
			description: this.description,
			photo_url: this.photoUrl,
			user_id: this.actor.kind === 'user' ? this.actor.userId : null,
			user_ip: this.actor.kind === 'anonymous' ? this.actor.ip : null,
			status: this.status,
			moderation_approved: this.moderation?.approved ?? null,
			moderation_reason: this.moderation?.reason ?? null,
			moderation_confidence: this.moderation?.confidence ?? null,
			moderation_flags: this.moderation ? [...this.moderation.flags] : null,
			moderation_reviewed_at: this.moderation?.reviewedAt ?? null,
			reputation_recorded: this.reputationRecorded,
			created_at: this.createdAt,
			updated_at: this.updatedAt,
		};
	}
}
