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

import type {ILogger} from '@platewatch/api/src/ILogger';
import pino from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class PinoLogger implements ILogger {
	constructor(private readonly logger: pino.Logger) {}

	trace(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
		this.write('trace', contextOrMsg, msg);
	}

	debug(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
		this.write('debug', contextOrMsg, msg);
	}

	info(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
		this.write('info', contextOrMsg, msg);
	}

	warn(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
		this.write('warn', contextOrMsg, msg);
	}

	error(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
		this.write('error', contextOrMsg, msg);
	}

	fatal(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
		this.write('fatal', contextOrMsg, msg);
	}

	child(bindings: Record<string, unknown>): ILogger {
		return new PinoLogger(this.logger.child(bindings));
	}

	private write(level: LogLevel, contextOrMsg: Record<string, unknown> | string, msg?: string): void {
		if (typeof contextOrMsg === 'string') {
			this.logger[level](contextOrMsg);
			return;
		}
		this.logger[level](serializeErrors(contextOrMsg), msg);
	}
}

function serializeErrors(context: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(context)) {
		out[key] = value instanceof Error ? pino.stdSerializers.err(value) : value;
	}
	return out;
}

export class NoopLogger implements ILogger {
	trace(): void {}
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
	fatal(): void {}
	child(): ILogger {
		return this;
	}
}

export function createPinoLogger(options: {level: string; service: string}): ILogger {
	return new PinoLogger(
		pino({
			level: options.level,
			base: {service: options.service},
			timestamp: pino.stdTimeFunctions.isoTime,
		}),
	);
}

let activeLogger: ILogger = new NoopLogger();

export function initializeLogger(logger: ILogger): void {
	activeLogger = logger;
}

export const Logger: ILogger = {
	trace: (contextOrMsg: Record<string, unknown> | string, msg?: string) => forward('trace', contextOrMsg, msg),
	debug: (contextOrMsg: Record<string, unknown> | string, msg?: string) => forward('debug', contextOrMsg, msg),
	info: (contextOrMsg: Record<string, unknown> | string, msg?: string) => forward('info', contextOrMsg, msg),
	warn: (contextOrMsg: Record<string, unknown> | string, msg?: string) => forward('warn', contextOrMsg, msg),
	error: (contextOrMsg: Record<string, unknown> | string, msg?: string) => forward('error', contextOrMsg, msg),
	fatal: (contextOrMsg: Record<string, unknown> | string, msg?: string) => forward('fatal', contextOrMsg, msg),
	child: (bindings: Record<string, unknown>) => activeLogger.child(bindings),
};

function forward(level: LogLevel, contextOrMsg: Record<string, unknown> | string, msg?: string): void {
	if (typeof contextOrMsg === 'string') {
		activeLogger[level](contextOrMsg);
	} else {
		activeLogger[level](contextOrMsg, msg);
	}
}
