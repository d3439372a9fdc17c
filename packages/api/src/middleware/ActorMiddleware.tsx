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

import type {HonoEnv} from '@platewatch/api/src/types/HonoEnv';
import {getClientIp} from '@platewatch/api/src/utils/IpUtils';
import {createMiddleware} from 'hono/factory';

/** Resolves the caller into `actor` (and `identity` when a token verified). Never rejects the request. */
export function ActorMiddleware(options: {trustForwardedFor: boolean}) {
	return createMiddleware<HonoEnv>(async (ctx, next) => {
		const clientIp = getClientIp(ctx, options);
		const {actor, identity} = await ctx.get('identityResolver').resolveRequest({
			authorization: ctx.req.header('authorization'),
			clientIp,
		});
		ctx.set('clientIp', clientIp);
		ctx.set('actor', actor);
		ctx.set('identity', identity);
		await next();
	});
}
