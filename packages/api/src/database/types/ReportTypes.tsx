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
import type {ReportStatus} from '@platewatch/constants/src/ReportConstants';

export interface ReportRow {
	report_id: ReportID;
	plate_number: string;
	violations: Array<string> | null;
	location: string;
	description: string | null;
	photo_url: string | null;
	user_id: UserID | null;
	user_ip: string | null;
	status: ReportStatus;
	moderation_approved: boolean | null;
	moderation_reason: string | null;
	moderation_confidence: number | null;
	moderation_flags: Array<string> | null;
	moderation_reviewed_at: Date | null;
	reputation_recorded: boolean | null;
	created_at: Date;
	updated_at: Date;
}

export const REPORT_COLUMNS = [
	'report_id',
	'plate_number',
	'violations',
	'location',
	'description',
	'photo_url',
	'user_id',
	'user_ip',
	'status',
	'moderation_approved',
	'moderation_reason',
	'moderation_confidence',
	'moderation_flags',
	'moderation_reviewed_at',
	'reputation_recorded',
	'created_at',
	'updated_at',
] as const satisfies ReadonlyArray<keyof ReportRow>;

export interface ReportByPlateRow {
	plate_number: string;
	created_at: Date;
	report_id: ReportID;
}

export interface ReportByUserRow {
	user_id: UserID;
	created_at: Date;
	report_id: ReportID;
}

/** Approved reports bucketed by creation month (`year * 12 + month`). */
export interface ApprovedReportByMonthRow {
	bucket: number;
	created_at: Date;
	report_id: ReportID;
}

export interface PendingReportRow {
	shard: number;
	created_at: Date;
	report_id: ReportID;
}

export interface DuplicateClaimRow {
	plate_number: string;
	actor_key: string;
	violation: string;
	report_id: ReportID;
	created_at: Date;
}

export interface ReportCounterRow {
	name: string;
	value: bigint | number | null;
}
