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

import {ReportResponse} from '@platewatch/schema/src/domains/report/ReportSchemas';
import {IsoTimestampType} from '@platewatch/schema/src/primitives/SchemaPrimitives';
import {z} from 'zod';

export const UserPrivateResponse = z.object({
	id: z.string().uuid(),
	email: z.string(),
	display_name: z.string().nullable(),
	photo_url: z.string().nullable(),
	total_reports: z.number().int(),
	approved_reports: z.number().int(),
	rejected_reports: z.number().int(),
	reputation_score: z.number(),
	is_banned: z.boolean(),
	ban_reason: z.string().nullable(),
	created_at: IsoTimestampType,
	last_login_at: IsoTimestampType.nullable(),
});

export type UserPrivateResponse = z.infer<typeof UserPrivateResponse>;

export const UserRegisterResponse = z.object({
	created: z.boolean(),
	user: UserPrivateResponse,
});

export type UserRegisterResponse = z.infer<typeof UserRegisterResponse>;

export const UserReportsResponse = z.object({
	reports: z.array(ReportResponse),
	total: z.number().int(),
});

export type UserReportsResponse = z.infer<typeof UserReportsResponse>;
