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

import type {IdentityResolver} from '@platewatch/api/src/identity/IdentityResolver';
import type {ReportQueryService} from '@platewatch/api/src/report/ReportQueryService';
import type {ReportService} from '@platewatch/api/src/report/ReportService';
import type {HonoEnv} from '@platewatch/api/src/types/HonoEnv';
import type {UserService} from '@platewatch/api/src/user/UserService';
import {createMiddleware} from 'hono/factory';

export interface Services {
	reportService: ReportService;
	reportQueryService: ReportQueryService;
	userService: UserService;
	identityResolver: IdentityResolver;
}

export function ServiceMiddleware(services: Services) {
	return createMiddleware<HonoEnv>(async (ctx, next) => {
		ctx.set('reportService', services.reportService);
		ctx.set('reportQueryService', services.reportQueryService);
		ctx.set('userService', services.userService);
		ctx.set('identityResolver', services.identityResolver);
		await next();
	});
}
