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
import {IdentityRequired, LoginRequired} from '@platewatch/api/src/middleware/AuthMiddleware';
import type {HonoApp} from '@platewatch/api/src/types/HonoEnv';
import {mapUserToPrivateResponse} from '@platewatch/api/src/user/UserMappers';

export function AuthController(app: HonoApp, options: {trustForwardedFor: boolean}) {
	app.post('/auth/register', ActorMiddleware(options), IdentityRequired, async (ctx) => {
		const {created, user} = await ctx.get('userService').register(ctx.get('verifiedIdentity'));
		return ctx.json({created, user: mapUserToPrivateResponse(user)}, created ? 201 : 200);
	});

	app.get('/auth/profile', ActorMiddleware(options), LoginRequired, async (ctx) => {
		return ctx.json(mapUserToPrivateResponse(ctx.get('user')));
	});

	app.get('/auth/reports', ActorMiddleware(options), LoginRequired, async (ctx) => {
		return ctx.json(await ctx.get('reportQueryService').listByUser(ctx.get('user').id));
	});
}
