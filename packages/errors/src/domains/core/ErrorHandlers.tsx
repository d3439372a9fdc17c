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
import {jsonErrorResponse} from '@platewatch/errors/src/ErrorHandler';
import type {NotFoundHandler} from 'hono';

export const AppNotFoundHandler: NotFoundHandler = (ctx) =>
	jsonErrorResponse(404, {
		code: APIErrorCodes.NOT_FOUND,
		message: `No route for ${ctx.req.method} ${ctx.req.path}`,
	});
