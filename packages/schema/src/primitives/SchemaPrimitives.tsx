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

import {ValidationErrorCodes} from '@platewatch/constants/src/ValidationErrorCodes';
import {z} from 'zod';

export function createStringType(minLength = 0, maxLength = 2048) {
	return z
		.string({invalid_type_error: ValidationErrorCodes.INVALID_TYPE})
		.trim()
		.min(minLength, {message: minLength <= 1 ? ValidationErrorCodes.REQUIRED : ValidationErrorCodes.TOO_SHORT})
		.max(maxLength, {message: ValidationErrorCodes.TOO_LONG});
}

export function isHttpUrl(value: string): boolean {
	try {
		const url = new URL(value);
		return url.protocol === 'http:' || url.protocol === 'https:';
	} catch {
		return false;
	}
}

export const IsoTimestampType = z.string().datetime().describe('ISO 8601 timestamp');

