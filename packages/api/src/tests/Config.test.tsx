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

import {loadConfig} from '@platewatch/api/src/Config';
import {afterEach, describe, expect, it, vi} from 'vitest';

describe('loadConfig', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('falls back to the defaults', () => {
		vi.stubEnv('MODERATION_TIMEOUT_MS', '');
		vi.stubEnv('REPORT_DUPLICATE_WINDOW_HOURS', '');
		vi.stubEnv('TRUST_X_FORWARDED_FOR', '');

		const config = loadConfig();

		expect(config.nodeEnv).toBe('test');
		expect(config.logLevel).toBe('silent');
		expect(config.trustForwardedFor).toBe(true);
		expect(config.cassandra).toMatchObject({hosts: 'localhost', keyspace: 'platewatch_test', localDc: 'datacenter1'});
		expect(config.moderation).toEqual({
			apiKey: 'test-api-key',
			model: 'claude-3-5-haiku-latest',
			timeoutMs: 15000,
			maxAttempts: 3,
			retryBackoffMs: 500,
			maxOutputTokens: 500,
		});
		expect(config.reports).toEqual({
			duplicateWindowHours: 24,
			feedLookbackMonths: 24,
			pendingRecoveryIntervalMs: 60000,
			pendingRecoveryAgeMs: 120000,
		});
	});

	it('reads overrides from the environment', () => {
		vi.stubEnv('REPORT_DUPLICATE_WINDOW_HOURS', '6');
		vi.stubEnv('REPORT_MODERATION_MAX_ATTEMPTS', '5');
		vi.stubEnv('TRUST_X_FORWARDED_FOR', 'false');
		vi.stubEnv('MODERATION_TIMEOUT_MS', 'soon');

		const config = loadConfig();

		expect(config.reports.duplicateWindowHours).toBe(6);
		expect(config.moderation.maxAttempts).toBe(5);
		expect(config.trustForwardedFor).toBe(false);
		expect(config.moderation.timeoutMs).toBe(15000);
	});

	it('requires the classifier API key', () => {
		vi.stubEnv('ANTHROPIC_API_KEY', '');

		expect(() => loadConfig()).toThrow('Missing required environment variable: ANTHROPIC_API_KEY');
	});

	it('rejects an unknown log level', () => {
		vi.stubEnv('LOG_LEVEL', 'verbose');

		expect(() => loadConfig()).toThrow();
	});
});
