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

import {serve} from '@hono/node-server';
import {createInitializer, createShutdown} from '@platewatch/api/src/app/APILifecycle';
import {createApp} from '@platewatch/api/src/app/App';
import {Config} from '@platewatch/api/src/Config';
import {initializeSentry} from '@platewatch/api/src/Instrument';
import {createPinoLogger, initializeLogger, Logger} from '@platewatch/api/src/Logger';
import {createServices} from '@platewatch/api/src/middleware/ServiceRegistry';

initializeLogger(createPinoLogger({level: Config.logLevel, service: 'platewatch-api'}));
initializeSentry({dsn: Config.sentry.dsn, environment: Config.nodeEnv});

const services = createServices(Config);
const app = createApp(services, {
	includeStack: Config.nodeEnv !== 'production',
	trustForwardedFor: Config.trustForwardedFor,
});

const initialize = createInitializer(Config, Logger, services);
const shutdownServices = createShutdown(Logger);

await initialize();

const server = serve({fetch: app.fetch, hostname: '0.0.0.0', port: Config.port}, (info) => {
	Logger.info({address: info.address, port: info.port}, 'PlateWatch API listening');
});

let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
	if (isShuttingDown) {
		Logger.warn({signal}, 'Shutdown already in progress, ignoring duplicate signal');
		return;
	}
	isShuttingDown = true;
	Logger.info({signal}, 'Beginning graceful shutdown');

	await new Promise<void>((resolve) => {
		const timeout = setTimeout(() => {
			Logger.warn('HTTP server close timeout, forcing shutdown');
			resolve();
		}, 3000);
		server.close((err) => {
			clearTimeout(timeout);
			if (err !== undefined) {
				Logger.error({error: err.message}, 'Error closing HTTP server');
			} else {
				Logger.info('HTTP server closed');
			}
			resolve();
		});
	});

	await shutdownServices();
	process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
	process.once(signal, () => {
		shutdown(signal).catch((error: unknown) => {
			Logger.fatal({error}, 'Shutdown failed');
			process.exit(1);
		});
	});
}
