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

import {Logger} from '@platewatch/api/src/Logger';
import * as Sentry from '@sentry/node';

let sentryEnabled = false;

export function initializeSentry(options: {dsn: string | undefined; environment: string}): void {
	if (!options.dsn) {
		Logger.info('Sentry DSN not configured, error reporting disabled');
		return;
	}

	Sentry.init({
		dsn: options.dsn,
		environment: options.environment,
		tracesSampleRate: 0,
	});
	sentryEnabled = true;
	Logger.info({environment: options.environment}, 'Sentry initialized');
}

export function captureException(error: unknown, context?: Record<string, unknown>): void {
	if (!sentryEnabled) return;
	Sentry.captureException(error, context ? {extra: context} : undefined);
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
	if (!sentryEnabled) return;
	await Sentry.flush(timeoutMs);
}
