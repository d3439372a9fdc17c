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

import type {Config} from '@platewatch/api/src/Config';
import {connectCassandra, shutdownCassandra} from '@platewatch/api/src/database/Cassandra';
import type {ILogger} from '@platewatch/api/src/ILogger';
import {flushSentry} from '@platewatch/api/src/Instrument';
import type {Services} from '@platewatch/api/src/middleware/ServiceMiddleware';
import {PendingReportRecovery} from '@platewatch/api/src/report/PendingReportRecovery';

let pendingRecovery: PendingReportRecovery | null = null;

export function createInitializer(config: Config, logger: ILogger, services: Services): () => Promise<void> {
	return async (): Promise<void> => {
		logger.info('Initializing API service...');

		await connectCassandra();

		pendingRecovery = new PendingReportRecovery(services.reportService, logger, {
			intervalMs: config.reports.pendingRecoveryIntervalMs,
			olderThanMs: config.reports.pendingRecoveryAgeMs,
		});
		pendingRecovery.start();

		logger.info('API service initialization complete');
	};
}

export function createShutdown(logger: ILogger): () => Promise<void> {
	return async (): Promise<void> => {
		logger.info('Shutting down API service...');

		if (pendingRecovery) {
			try {
				await pendingRecovery.stop();
				pendingRecovery = null;
			} catch (error) {
				logger.error({error}, 'Error stopping pending report recovery');
			}
		}

		try {
			await shutdownCassandra();
			logger.info('Cassandra connection closed');
		} catch (error) {
			logger.error({error}, 'Error closing Cassandra connection');
		}

		try {
			await flushSentry();
		} catch (error) {
			logger.error({error}, 'Error flushing Sentry events');
		}

		logger.info('API service shutdown complete');
	};
}
