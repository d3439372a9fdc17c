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

export const APIErrorCodes = {
	GENERAL_ERROR: 'GENERAL_ERROR',
	INVALID_FORM_BODY: 'INVALID_FORM_BODY',
	BAD_REQUEST: 'BAD_REQUEST',
	NOT_FOUND: 'NOT_FOUND',
	UNAUTHORIZED: 'UNAUTHORIZED',
	UNKNOWN_USER: 'UNKNOWN_USER',
	REPORTER_BANNED: 'REPORTER_BANNED',
	DUPLICATE_REPORT: 'DUPLICATE_REPORT',
	PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
	MODERATION_UNAVAILABLE: 'MODERATION_UNAVAILABLE',
} as const;

export type APIErrorCode = (typeof APIErrorCodes)[keyof typeof APIErrorCodes];
