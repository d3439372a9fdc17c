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

import {PLATE_NUMBER_MAX_LENGTH, VIOLATION_MAX_LENGTH} from '@platewatch/constants/src/ReportConstants';
import {ValidationErrorCodes} from '@platewatch/constants/src/ValidationErrorCodes';
import {z} from 'zod';

const PLATE_NUMBER_PATTERN = /^[A-Z0-9-]+$/;

export function normalizePlateNumber(value: string): string {
	return value.replace(/\s+/g, '').toUpperCase();
}

/** Trims and lowercases each entry, keeping the first occurrence of repeats. */
export function normalizeViolations(values: ReadonlyArray<string>): Array<string> {
	const seen = new Set<string>();
	const result: Array<string> = [];
	for (const value of values) {
		const normalized = value.trim().toLowerCase();
		if (seen.has(normalized)) continue;
		seen.add(normalized);
		result.push(normalized);
	}
	return result;
}

export const PlateNumberType = z
	.string({
		required_error: ValidationErrorCodes.PLATE_NUMBER_REQUIRED,
		invalid_type_error: ValidationErrorCodes.INVALID_TYPE,
	})
	.transform(normalizePlateNumber)
	.pipe(
		z
			.string()
			.min(1, {message: ValidationErrorCodes.PLATE_NUMBER_REQUIRED})
			.max(PLATE_NUMBER_MAX_LENGTH, {message: ValidationErrorCodes.TOO_LONG})
			.regex(PLATE_NUMBER_PATTERN, {message: ValidationErrorCodes.PLATE_NUMBER_INVALID}),
	)
	.describe('Vehicle registration plate, uppercased with whitespace removed');

export const ViolationType = z
	.string({invalid_type_error: ValidationErrorCodes.INVALID_TYPE})
	.trim()
	.toLowerCase()
	.min(1, {message: ValidationErrorCodes.VIOLATION_BLANK})
	.max(VIOLATION_MAX_LENGTH, {message: ValidationErrorCodes.TOO_LONG})
	.describe('Violation category, e.g. "no_helmet" or "red_light"');
