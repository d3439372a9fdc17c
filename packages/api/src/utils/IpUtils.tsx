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

import {getConnInfo} from '@hono/node-server/conninfo';
import type {Context} from 'hono';

export const UNKNOWN_CLIENT_IP = 'unknown';

export function firstForwardedFor(headerValue: string | undefined): string | null {
	if (!headerValue) return null;
	const first = headerValue.split(',')[0]?.trim();
	return first ? first : null;
}

/** First `X-Forwarded-For` entry when trusted, then the socket address. */
export function getClientIp(ctx: Context, options: {trustForwardedFor: boolean}): string {
	if (options.trustForwardedFor) {
		const forwarded = firstForwardedFor(ctx.req.header('x-forwarded-for'));
		if (forwarded) return forwarded;
	}

	try {
		return getConnInfo(ctx).remote.address ?? UNKNOWN_CLIENT_IP;
	} catch {
		// no socket outside the node server (app.request in tests)
		return UNKNOWN_CLIENT_IP;
	}
}
