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

export const ValidationErrorCodes = {
	REQUIRED: 'REQUIRED',
	INVALID_TYPE: 'INVALID_TYPE',
	INVALID_FORMAT: 'INVALID_FORMAT',
	TOO_SHORT: 'TOO_SHORT',
	TOO_LONG: 'TOO_LONG',
	OUT_OF_RANGE: 'OUT_OF_RANGE',
	UNKNOWN_FIELD: 'UNKNOWN_FIELD',
	PLATE_NUMBER_REQUIRED: 'PLATE_NUMBER_REQUIRED',
	PLATE_NUMBER_INVALID: 'PLATE_NUMBER_INVALID',
	VIOLATIONS_REQUIRED: 'VIOLATIONS_REQUIRED',
	VIOLATION_BLANK: 'VIOLATION_BLANK',
	LOCATION_REQUIRED: 'LOCATION_REQUIRED',
	PHOTO_URL_INVALID: 'PHOTO_URL_INVALID',
	EMAIL_ALREADY_REGISTERED: 'EMAIL_ALREADY_REGISTERED',
	IDENTITY_EMAIL_MISSING: 'IDENTITY_EMAIL_MISSING',
} as const;

export type ValidationErrorCode = (typeof ValidationErrorCodes)[keyof typeof ValidationErrorCodes];

export const ValidationErrorMessages: Record<ValidationErrorCode, string> = {
	REQUIRED: 'This field is required',
	INVALID_TYPE: 'This field has the wrong type',
	INVALID_FORMAT: 'This field is not in a valid format',
	TOO_SHORT: 'This field is too short',
	TOO_LONG: 'This field is too long',
	OUT_OF_RANGE: 'This value is out of range',
	UNKNOWN_FIELD: 'This field is not recognized',
	PLATE_NUMBER_REQUIRED: 'A plate number is required',
	PLATE_NUMBER_INVALID: 'Plate numbers may only contain letters, digits and hyphens',
	VIOLATIONS_REQUIRED: 'At least one violation is required',
	VIOLATION_BLANK: 'Violation categories cannot be blank',
	LOCATION_REQUIRED: 'A location is required',
	PHOTO_URL_INVALID: 'The photo URL must be an http(s) URL',
	EMAIL_ALREADY_REGISTERED: 'This email address is already registered to another account',
	IDENTITY_EMAIL_MISSING: 'The identity token does not carry an email address',
};

export function isValidationErrorCode(value: string): value is ValidationErrorCode {
	return Object.hasOwn(ValidationErrorMessages, value);
}
