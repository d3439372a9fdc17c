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
import {PlateWatchError} from '@platewatch/errors/src/PlateWatchError';
import type {Context, ErrorHandler} from 'hono';
import {HTTPException} from 'hono/http-exception';

export interface ErrorHandlerOptions {
	includeStack?: boolean;
	logError?: (error: Error, ctx: Context) => void;
	customHandler?: (error: Error, ctx: Context) => Response | Promise<Response> | null;
}

export function jsonErrorResponse(status: number, body: Record<string, unknown>): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: {'content-type': 'application/json; charset=UTF-8'},
	});
}

function codeForHttpStatus(status: number): string {
	switch (status) {
		case 401:
			return APIErrorCodes.UNAUTHORIZED;
		case 404:
			return APIErrorCodes.NOT_FOUND;
		default:
			return status >= 500 ? APIErrorCodes.GENERAL_ERROR : APIErrorCodes.BAD_REQUEST;
	}
}

export function renderError(error: Error, includeStack: boolean): Response {
	if (error instanceof PlateWatchError) {
		return jsonErrorResponse(error.status, error.toJSON());
	}

	if (error instanceof HTTPException) {
		return jsonErrorResponse(error.status, {
			code: codeForHttpStatus(error.status),
			message: error.message || 'Request failed',
		});
	}

	return jsonErrorResponse(500, {
		code: APIErrorCodes.GENERAL_ERROR,
		message: 'Internal Server Error',
		...(includeStack && error.stack ? {stack: error.stack} : {}),
	});
}

export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorHandler {
	const includeStack = options.includeStack ?? false;

	return async (error, ctx) => {
		options.logError?.(error, ctx);

		if (options.customHandler) {
			const custom = await options.customHandler(error, ctx);
			if (custom) return custom;
		}

		return renderError(error, includeStack);
	};
}
