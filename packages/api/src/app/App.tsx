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

import {AuthController} from '@platewatch/api/src/auth/AuthController';
import {captureException} from '@platewatch/api/src/Instrument';
import {Logger} from '@platewatch/api/src/Logger';
import {type Services, ServiceMiddleware} from '@platewatch/api/src/middleware/ServiceMiddleware';
import {ReportController} from '@platewatch/api/src/report/ReportController';
import type {HonoEnv} from '@platewatch/api/src/types/HonoEnv';
import {AppNotFoundHandler} from '@platewatch/errors/src/domains/core/ErrorHandlers';
import {createErrorHandler} from '@platewatch/errors/src/ErrorHandler';
import {PlateWatchError} from '@platewatch/errors/src/PlateWatchError';
import {Hono} from 'hono';
import {HTTPException} from 'hono/http-exception';
import {logger} from 'hono/logger';

export interface AppOptions {
	includeStack: boolean;
	trustForwardedFor: boolean;
}

function isExpectedError(error: Error): boolean {
	if (error instanceof PlateWatchError) return error.isExpected;
	return error instanceof HTTPException && error.status < 500;
}

export function createApp(services: Services, options: AppOptions): Hono<HonoEnv> {
	const app = new Hono<HonoEnv>({strict: true});

	app.use(
		logger((message: string, ...rest: Array<string>) => {
			Logger.info(rest.length > 0 ? `${message} ${rest.join(' ')}` : message);
		}),
	);
	app.use(ServiceMiddleware(services));

	app.onError(
		createErrorHandler({
			includeStack: options.includeStack,
			logError: (error, ctx) => {
				if (isExpectedError(error)) {
					Logger.debug({path: ctx.req.path, error: error.message}, 'Request failed');
					return;
				}
				Logger.error({error, method: ctx.req.method, path: ctx.req.path}, 'Unhandled request error');
				captureException(error, {method: ctx.req.method, path: ctx.req.path});
			},
		}),
	);
	app.notFound(AppNotFoundHandler);

	app.get('/_health', async (ctx) => ctx.text('OK'));

	ReportController(app, options);
	AuthController(app, options);

	return app;
}
