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

import {APIErrorCodes} from '@platewatch/constants/src/ApiErrorCodes';
import {
	isValidationErrorCode,
	type ValidationErrorCode,
	ValidationErrorCodes,
	ValidationErrorMessages,
} from '@platewatch/constants/src/ValidationErrorCodes';
import {PlateWatchError} from '@platewatch/errors/src/PlateWatchError';
import type {ZodError, ZodIssue} from 'zod';

export interface ValidationIssue {
	path: string;
	code: ValidationErrorCode;
	message: string;
}

function codeForIssue(issue: ZodIssue): ValidationErrorCode {
	if (isValidationErrorCode(issue.message)) {
		return issue.message;
	}

	switch (issue.code) {
		case 'invalid_type':
			return issue.received === 'undefined' ? ValidationErrorCodes.REQUIRED : ValidationErrorCodes.INVALID_TYPE;
		case 'too_small':
			return issue.type === 'number' || issue.type === 'bigint'
				? ValidationErrorCodes.OUT_OF_RANGE
				: ValidationErrorCodes.TOO_SHORT;
		case 'too_big':
			return issue.type === 'number' || issue.type === 'bigint'
				? ValidationErrorCodes.OUT_OF_RANGE
				: ValidationErrorCodes.TOO_LONG;
		case 'unrecognized_keys':
			return ValidationErrorCodes.UNKNOWN_FIELD;
		default:
			return ValidationErrorCodes.INVALID_FORMAT;
	}
}

export class InputValidationError extends PlateWatchError {
	readonly errors: ReadonlyArray<ValidationIssue>;

	constructor(errors: ReadonlyArray<ValidationIssue>) {
		super({
			code: APIErrorCodes.INVALID_FORM_BODY,
			status: 400,
			message: 'Invalid form body',
			data: {errors},
		});
		this.errors = errors;
	}

	static fromCode(path: string, code: ValidationErrorCode): InputValidationError {
		return new InputValidationError([{path, code, message: ValidationErrorMessages[code]}]);
	}

	static fromZodError(error: ZodError): InputValidationError {
		return new InputValidationError(
			error.issues.map((issue) => {
				const code = codeForIssue(issue);
				return {path: issue.path.join('.'), code, message: ValidationErrorMessages[code]};
			}),
		);
	}
}
