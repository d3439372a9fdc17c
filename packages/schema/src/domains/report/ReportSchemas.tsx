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

import {
	DESCRIPTION_MAX_LENGTH,
	LOCATION_MAX_LENGTH,
	MAX_VIOLATIONS_PER_REPORT,
	PHOTO_URL_MAX_LENGTH,
	REPORT_FEED_DEFAULT_LIMIT,
	REPORT_FEED_MAX_LIMIT,
} from '@platewatch/constants/src/ReportConstants';
import {ValidationErrorCodes} from '@platewatch/constants/src/ValidationErrorCodes';
import {ModerationVerdict} from '@platewatch/schema/src/domains/moderation/ModerationSchemas';
import {normalizeViolations, PlateNumberType, ViolationType} from '@platewatch/schema/src/primitives/ReportValidators';
import {createStringType, IsoTimestampType, isHttpUrl} from '@platewatch/schema/src/primitives/SchemaPrimitives';
import {z} from 'zod';

export const ReportStatusSchema = z.enum(['pending', 'approved', 'rejected']);

export const ReportCreateRequest = z.object({
	plate_number: PlateNumberType,
	violations: z
		.array(ViolationType, {
			required_error: ValidationErrorCodes.VIOLATIONS_REQUIRED,
			invalid_type_error: ValidationErrorCodes.INVALID_TYPE,
		})
		.min(1, {message: ValidationErrorCodes.VIOLATIONS_REQUIRED})
		.max(MAX_VIOLATIONS_PER_REPORT, {message: ValidationErrorCodes.TOO_LONG})
		.transform(normalizeViolations),
	location: z
		.string({
			required_error: ValidationErrorCodes.LOCATION_REQUIRED,
			invalid_type_error: ValidationErrorCodes.INVALID_TYPE,
		})
		.trim()
		.min(1, {message: ValidationErrorCodes.LOCATION_REQUIRED})
		.max(LOCATION_MAX_LENGTH, {message: ValidationErrorCodes.TOO_LONG}),
	description: createStringType(0, DESCRIPTION_MAX_LENGTH)
		.nullish()
		.transform((value) => (value ? value : null)),
	photo_url: createStringType(0, PHOTO_URL_MAX_LENGTH)
		.refine((value) => value === '' || isHttpUrl(value), {message: ValidationErrorCodes.PHOTO_URL_INVALID})
		.nullish()
		.transform((value) => (value ? value : null)),
});

export type ReportCreateRequest = z.infer<typeof ReportCreateRequest>;
export type ReportCreateRequestInput = z.input<typeof ReportCreateRequest>;

export const ReportListQuery = z.object({
	limit: z.coerce
		.number({invalid_type_error: ValidationErrorCodes.INVALID_TYPE})
		.int()
		.min(1)
		.max(REPORT_FEED_MAX_LIMIT)
		.default(REPORT_FEED_DEFAULT_LIMIT),
	offset: z.coerce.number({invalid_type_error: ValidationErrorCodes.INVALID_TYPE}).int().min(0).default(0),
});

export type ReportListQuery = z.infer<typeof ReportListQuery>;

export const PlateNumberParam = z.object({
	plate_number: PlateNumberType,
});

export const PlateReportScope = z.enum(['approved', 'all']);
export type PlateReportScope = z.infer<typeof PlateReportScope>;

export const PlateReportsQuery = z.object({
	scope: PlateReportScope.default('approved'),
});

export const ModerationResponse = ModerationVerdict.extend({
	reviewed_at: IsoTimestampType,
});

export type ModerationResponse = z.infer<typeof ModerationResponse>;

export const ReportResponse = z.object({
	id: z.string().uuid(),
	plate_number: z.string(),
	violations: z.array(z.string()),
	location: z.string(),
	description: z.string().nullable(),
	photo_url: z.string().nullable(),
	user_id: z.string().nullable(),
	status: ReportStatusSchema,
	moderation: ModerationResponse.nullable(),
	created_at: IsoTimestampType,
	updated_at: IsoTimestampType,
});

export type ReportResponse = z.infer<typeof ReportResponse>;

export const ReportListResponse = z.object({
	reports: z.array(ReportResponse),
	total: z.number().int(),
	limit: z.number().int(),
	offset: z.number().int(),
});

export type ReportListResponse = z.infer<typeof ReportListResponse>;

export const PlateReportsResponse = z.object({
	plate_number: z.string(),
	scope: PlateReportScope,
	total_reports: z.number().int(),
	reports: z.array(ReportResponse),
	violation_breakdown: z.record(z.string(), z.number().int()),
	safety_score: z.number().int().min(0).max(100),
});

export type PlateReportsResponse = z.infer<typeof PlateReportsResponse>;

export const ReportStatsResponse = z.object({
	total: z.number().int(),
	approved: z.number().int(),
	rejected: z.number().int(),
	pending: z.number().int(),
	today: z.number().int(),
	approval_rate: z.number(),
});

export type ReportStatsResponse = z.infer<typeof ReportStatsResponse>;
