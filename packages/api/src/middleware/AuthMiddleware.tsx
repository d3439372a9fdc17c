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
import {UnauthorizedError} from '@platewatch/errors/src/domains/core/UnauthorizedError';
import {UnknownUserError} from '@platewatch/errors/src/domains/user/UnknownUserError';
import {createMiddleware} from 'hono/factory';

// Both run after ActorMiddleware.

export const IdentityRequired = createMiddleware<HonoEnv>(async (ctx, next) => {
	const identity = ctx.get('identity');
	if (!identity) {
		throw new UnauthorizedError();
	}
	ctx.set('verifiedIdentity', identity);
	await next();
});

export const LoginRequired = createMiddleware<HonoEnv>(async (ctx, next) => {
	const actor = ctx.get('actor');
	if (actor.kind === 'user') {
		ctx.set('user', actor.user);
		await next();
		return;
	}
	if (ctx.get('identity')) {
		throw new UnknownUserError();
	}
	throw new UnauthorizedError();
});
