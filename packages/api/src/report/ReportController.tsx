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

import {ActorMiddleware} from '@platewatch/api/src/middleware/ActorMiddleware';
import {mapReportToResponse} from '@platewatch/api/src/report/ReportMappers';
import type {HonoApp} from '@platewatch/api/src/types/HonoEnv';
import {Validator} from '@platewatch/api/src/Validator';
import {
	PlateNumberParam,
	PlateReportsQuery,
	ReportCreateRequest,
	ReportListQuery,
} from '@platewatch/schema/src/domains/report/ReportSchemas';

export function ReportController(app: HonoApp, options: {trustForwardedFor: boolean}) {
	app.post('/reports', ActorMiddleware(options), Validator('json', ReportCreateRequest), async (ctx) => {
		// Not bound to the request signal; the report is finalized even if the client disconnects.
		const report = await ctx.get('reportService').submit(ctx.req.valid('json'), ctx.get('actor'));
		return ctx.json(mapReportToResponse(report), 201);
	});

	app.get('/reports', Validator('query', ReportListQuery), async (ctx) => {
		const response = await ctx.get('reportQueryService').listApproved(ctx.req.valid('query'));
		return ctx.json(response);
	});

	app.get(
		'/reports/plate/:plate_number',
		Validator('param', PlateNumberParam),
		Validator('query', PlateReportsQuery),
		async (ctx) => {
			const response = await ctx
				.get('reportQueryService')
				.listByPlate(ctx.req.valid('param').plate_number, ctx.req.valid('query'));
			return ctx.json(response);
		},
	);

	app.get('/stats', async (ctx) => {
		return ctx.json(await ctx.get('reportQueryService').getStats());
	});
}
