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

import {ms, seconds} from 'itty-time';

export const ReportStatuses = {
	PENDING: 'pending',
	APPROVED: 'approved',
	REJECTED: 'rejected',
} as const;

export type ReportStatus = (typeof ReportStatuses)[keyof typeof ReportStatuses];
export type ReportOutcome = Exclude<ReportStatus, 'pending'>;

export const PLATE_NUMBER_MAX_LENGTH = 20;
export const MAX_VIOLATIONS_PER_REPORT = 10;
export const VIOLATION_MAX_LENGTH = 64;
export const LOCATION_MAX_LENGTH = 500;
export const DESCRIPTION_MAX_LENGTH = 2000;
export const PHOTO_URL_MAX_LENGTH = 2048;

export const REPORT_FEED_DEFAULT_LIMIT = 10;
export const REPORT_FEED_MAX_LIMIT = 100;

export const DEFAULT_DUPLICATE_WINDOW_HOURS = 24;
export const DEFAULT_FEED_LOOKBACK_MONTHS = 24;
export const DEFAULT_PENDING_RECOVERY_INTERVAL_MS = ms('1 minute');
export const DEFAULT_PENDING_RECOVERY_AGE_MS = ms('2 minutes');
export const PENDING_RECOVERY_BATCH_SIZE = 50;

export const DEFAULT_MODERATION_TIMEOUT_MS = ms('15 seconds');
export const DEFAULT_MODERATION_MAX_ATTEMPTS = 3;
export const DEFAULT_MODERATION_RETRY_BACKOFF_MS = 500;
export const DEFAULT_MODERATION_MAX_OUTPUT_TOKENS = 500;
export const DEFAULT_MODERATION_MODEL = 'claude-3-5-haiku-latest';

export const MODERATION_UNAVAILABLE_REASON = 'moderation_unavailable';

export const SAFETY_SCORE_MAX = 100;
export const SAFETY_SCORE_PENALTY_PER_REPORT = 10;

export function duplicateWindowSeconds(hours: number): number {
	return seconds(`${hours} hours`);
}
