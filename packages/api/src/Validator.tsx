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

import {InputValidationError} from '@platewatch/errors/src/domains/core/InputValidationError';
import type {ValidationTargets} from 'hono';
import {validator} from 'hono/validator';
import type {z} from 'zod';

export function Validator<Target extends keyof ValidationTargets, Output, Input>(
	target: Target,
	schema: z.ZodType<Output, z.ZodTypeDef, Input>,
) {
	return validator(target, async (value): Promise<Output> => {
		const result = await schema.safeParseAsync(value);
		if (!result.success) {
			throw InputValidationError.fromZodError(result.error);
		}
		return result.data;
	});
}
