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

import {defineTable} from '@platewatch/api/src/database/Cassandra';
import type {
	ApprovedReportByMonthRow,
	DuplicateClaimRow,
	PendingReportRow,
	ReportByPlateRow,
	ReportByUserRow,
	ReportRow,
} from '@platewatch/api/src/database/types/ReportTypes';
import {REPORT_COLUMNS} from '@platewatch/api/src/database/types/ReportTypes';
import type {UserByEmailRow, UserByFirebaseUidRow, UserRow} from '@platewatch/api/src/database/types/UserTypes';
import {USER_COLUMNS} from '@platewatch/api/src/database/types/UserTypes';

export const Reports = defineTable<ReportRow, 'report_id'>({
	name: 'reports',
	columns: REPORT_COLUMNS,
	primaryKey: ['report_id'],
});

export const ReportsByPlate = defineTable<ReportByPlateRow, 'plate_number' | 'created_at' | 'report_id', 'plate_number'>(
	{
		name: 'reports_by_plate',
		columns: ['plate_number', 'created_at', 'report_id'],
		primaryKey: ['plate_number', 'created_at', 'report_id'],
		partitionKey: ['plate_number'],
	},
);

export const ReportsByUser = defineTable<ReportByUserRow, 'user_id' | 'created_at' | 'report_id', 'user_id'>({
	name: 'reports_by_user',
	columns: ['user_id', 'created_at', 'report_id'],
	primaryKey: ['user_id', 'created_at', 'report_id'],
	partitionKey: ['user_id'],
});

export const ApprovedReportsByMonth = defineTable<
	ApprovedReportByMonthRow,
	'bucket' | 'created_at' | 'report_id',
	'bucket'
>({
	name: 'approved_reports_by_month',
	columns: ['bucket', 'created_at', 'report_id'],
	primaryKey: ['bucket', 'created_at', 'report_id'],
	partitionKey: ['bucket'],
});

export const PendingReports = defineTable<PendingReportRow, 'shard' | 'created_at' | 'report_id', 'shard'>({
	name: 'pending_reports',
	columns: ['shard', 'created_at', 'report_id'],
	primaryKey: ['shard', 'created_at', 'report_id'],
	partitionKey: ['shard'],
});

export const ReportDuplicateClaims = defineTable<
	DuplicateClaimRow,
	'plate_number' | 'actor_key' | 'violation',
	'plate_number' | 'actor_key'
>({
	name: 'report_duplicate_claims',
	columns: ['plate_number', 'actor_key', 'violation', 'report_id', 'created_at'],
	primaryKey: ['plate_number', 'actor_key', 'violation'],
	partitionKey: ['plate_number', 'actor_key'],
});

export const Users = defineTable<UserRow, 'user_id'>({
	name: 'users',
	columns: USER_COLUMNS,
	primaryKey: ['user_id'],
});

export const UsersByFirebaseUid = defineTable<UserByFirebaseUidRow, 'firebase_uid'>({
	name: 'users_by_firebase_uid',
	columns: ['firebase_uid', 'user_id'],
	primaryKey: ['firebase_uid'],
});

export const UsersByEmail = defineTable<UserByEmailRow, 'email'>({
	name: 'users_by_email',
	columns: ['email', 'user_id'],
	primaryKey: ['email'],
});
