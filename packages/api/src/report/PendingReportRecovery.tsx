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
import type {ReportService} from '@platewatch/api/src/report/ReportService';

export interface PendingReportRecoveryOptions {
	intervalMs: number;
	olderThanMs: number;
}

/** Periodically finalizes reports left pending by a crashed or interrupted worker. */
export class PendingReportRecovery {
	private timer: NodeJS.Timeout | null = null;
	private running: Promise<void> | null = null;

	constructor(
		private readonly reportService: ReportService,
		private readonly logger: ILogger,
		private readonly options: PendingReportRecoveryOptions,
	) {}

	start(): void {
		if (this.timer || this.options.intervalMs <= 0) return;
		this.timer = setInterval(() => {
			this.tick();
		}, this.options.intervalMs);
		this.timer.unref();
		this.logger.info({intervalMs: this.options.intervalMs}, 'Pending report recovery started');
	}

	async stop(): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		if (this.running) {
			await this.running;
		}
	}

	async runOnce(): Promise<number> {
		return this.reportService.recoverPending(this.options.olderThanMs);
	}

	private tick(): void {
		if (this.running) return;
		this.running = this.runOnce()
			.then((recovered) => {
				if (recovered > 0) {
					this.logger.info({recovered}, 'Recovered pending reports');
				}
			})
			.catch((error: unknown) => {
				this.logger.error({error}, 'Pending report recovery failed');
			})
			.finally(() => {
				this.running = null;
			});
	}
}
