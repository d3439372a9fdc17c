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

import {createReportID} from '@platewatch/api/src/BrandedTypes';
import type {ILogger} from '@platewatch/api/src/ILogger';
import {PendingReportRecovery} from '@platewatch/api/src/report/PendingReportRecovery';
import {createTestServices} from '@platewatch/api/src/test/TestHarness';
import {ms} from 'itty-time';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

function createSpyLogger(): ILogger {
	const logger: ILogger = {
		trace: vi.fn(),
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		fatal: vi.fn(),
		child: () => logger,
	};
	return logger;
}

describe('PendingReportRecovery', () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it('sweeps stale pending reports on each interval', async () => {
		const harness = createTestServices();
		const reportId = createReportID('0f8fad5b-d9cb-469f-a165-70867728950e');
		const createdAt = new Date(harness.clock.nowMs() - ms('5 minutes'));
		harness.reportRepository.insert({
			report_id: reportId,
			plate_number: 'KL07AB1234',
			violations: ['signal_jump'],
			location: 'Kochi',
			description: null,
			photo_url: null,
			user_id: null,
			user_ip: '1.2.3.4',
			status: 'pending',
			moderation_approved: null,
			moderation_reason: null,
			moderation_confidence: null,
			moderation_flags: null,
			moderation_reviewed_at: null,
			reputation_recorded: false,
			created_at: createdAt,
			updated_at: createdAt,
		});
		const logger = createSpyLogger();
		const recovery = new PendingReportRecovery(harness.reportService, logger, {
			intervalMs: ms('1 minute'),
			olderThanMs: ms('2 minutes'),
		});

		recovery.start();
		await vi.advanceTimersByTimeAsync(ms('1 minute'));
		await recovery.stop();

		expect((await harness.reportRepository.findUnique(reportId))?.status).toBe('approved');
		expect(logger.info).toHaveBeenCalledWith({recovered: 1}, 'Recovered pending reports');
	});

	it('logs a failed sweep and keeps running', async () => {
		const harness = createTestServices();
		const failure = new Error('read timeout');
		const recoverPending = vi.spyOn(harness.reportService, 'recoverPending').mockRejectedValueOnce(failure);
		const logger = createSpyLogger();
		const recovery = new PendingReportRecovery(harness.reportService, logger, {
			intervalMs: ms('1 minute'),
			olderThanMs: ms('2 minutes'),
		});

		recovery.start();
		await vi.advanceTimersByTimeAsync(ms('2 minutes'));
		await recovery.stop();

		expect(logger.error).toHaveBeenCalledWith({error: failure}, 'Pending report recovery failed');
		expect(recoverPending).toHaveBeenCalledTimes(2);
	});

	it('does not schedule anything with a zero interval', async () => {
		const harness = createTestServices();
		const recoverPending = vi.spyOn(harness.reportService, 'recoverPending');
		const recovery = new PendingReportRecovery(harness.reportService, createSpyLogger(), {
			intervalMs: 0,
			olderThanMs: ms('2 minutes'),
		});

		recovery.start();
		await vi.advanceTimersByTimeAsync(ms('10 minutes'));
		await recovery.stop();

		expect(recoverPending).not.toHaveBeenCalled();
	});
});
