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

import process from 'node:process';
import {
	DEFAULT_DUPLICATE_WINDOW_HOURS,
	DEFAULT_FEED_LOOKBACK_MONTHS,
	DEFAULT_MODERATION_MAX_ATTEMPTS,
	DEFAULT_MODERATION_MAX_OUTPUT_TOKENS,
	DEFAULT_MODERATION_MODEL,
	DEFAULT_MODERATION_RETRY_BACKOFF_MS,
	DEFAULT_MODERATION_TIMEOUT_MS,
	DEFAULT_PENDING_RECOVERY_AGE_MS,
	DEFAULT_PENDING_RECOVERY_INTERVAL_MS,
} from '@platewatch/constants/src/ReportConstants';
import {z} from 'zod';

function required(key: string): string {
	const value = process.env[key];
	if (!value) {
		throw new Error(`Missing required environment variable: ${key}`);
	}
	return value;
}

function optional(key: string): string | undefined {
	return process.env[key] || undefined;
}

function optionalInt(key: string, defaultValue: number): number {
	const value = process.env[key];
	if (!value) return defaultValue;
	const parsed = Number.parseInt(value, 10);
	return Number.isNaN(parsed) ? defaultValue : parsed;
}

function optionalBool(key: string, defaultValue = false): boolean {
	const value = process.env[key];
	if (!value) return defaultValue;
	return value.toLowerCase() === 'true' || value === '1';
}

const ConfigSchema = z.object({
	nodeEnv: z.enum(['development', 'production', 'test']),
	port: z.number().int().positive(),
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
	trustForwardedFor: z.boolean(),

	cassandra: z.object({
		hosts: z.string(),
		keyspace: z.string(),
		localDc: z.string(),
		username: z.string().optional(),
		password: z.string().optional(),
	}),

	firebase: z.object({
		projectId: z.string().optional(),
		clientEmail: z.string().optional(),
		privateKey: z.string().optional(),
	}),

	moderation: z.object({
		apiKey: z.string(),
		model: z.string(),
		timeoutMs: z.number().int().positive(),
		maxAttempts: z.number().int().min(1),
		retryBackoffMs: z.number().int().min(0),
		maxOutputTokens: z.number().int().positive(),
	}),

	reports: z.object({
		duplicateWindowHours: z.number().int().positive(),
		feedLookbackMonths: z.number().int().positive(),
		pendingRecoveryIntervalMs: z.number().int().min(0),
		pendingRecoveryAgeMs: z.number().int().min(0),
	}),

	sentry: z.object({
		dsn: z.string().optional(),
	}),
});

export function loadConfig() {
	const nodeEnv = optional('NODE_ENV') || 'development';

	return ConfigSchema.parse({
		nodeEnv,
		port: optionalInt('PLATEWATCH_API_PORT', 8080),
		logLevel: optional('LOG_LEVEL') || (nodeEnv === 'production' ? 'info' : 'debug'),
		trustForwardedFor: optionalBool('TRUST_X_FORWARDED_FOR', true),

		cassandra: {
			hosts: optional('CASSANDRA_HOSTS') || 'localhost',
			keyspace: optional('CASSANDRA_KEYSPACE') || 'platewatch',
			localDc: optional('CASSANDRA_LOCAL_DC') || 'datacenter1',
			username: optional('CASSANDRA_USERNAME'),
			password: optional('CASSANDRA_PASSWORD'),
		},

		firebase: {
			projectId: optional('FIREBASE_PROJECT_ID'),
			clientEmail: optional('FIREBASE_CLIENT_EMAIL'),
			privateKey: optional('FIREBASE_PRIVATE_KEY'),
		},

		moderation: {
			apiKey: required('ANTHROPIC_API_KEY'),
			model: optional('MODERATION_MODEL') || DEFAULT_MODERATION_MODEL,
			timeoutMs: optionalInt('MODERATION_TIMEOUT_MS', DEFAULT_MODERATION_TIMEOUT_MS),
			maxAttempts: optionalInt('REPORT_MODERATION_MAX_ATTEMPTS', DEFAULT_MODERATION_MAX_ATTEMPTS),
			retryBackoffMs: optionalInt('REPORT_MODERATION_RETRY_BACKOFF_MS', DEFAULT_MODERATION_RETRY_BACKOFF_MS),
			maxOutputTokens: optionalInt('MODERATION_MAX_OUTPUT_TOKENS', DEFAULT_MODERATION_MAX_OUTPUT_TOKENS),
		},

		reports: {
			duplicateWindowHours: optionalInt('REPORT_DUPLICATE_WINDOW_HOURS', DEFAULT_DUPLICATE_WINDOW_HOURS),
			feedLookbackMonths: optionalInt('REPORT_FEED_LOOKBACK_MONTHS', DEFAULT_FEED_LOOKBACK_MONTHS),
			pendingRecoveryIntervalMs: optionalInt(
				'REPORT_PENDING_RECOVERY_INTERVAL_MS',
				DEFAULT_PENDING_RECOVERY_INTERVAL_MS,
			),
			pendingRecoveryAgeMs: optionalInt('REPORT_PENDING_RECOVERY_AGE_MS', DEFAULT_PENDING_RECOVERY_AGE_MS),
		},

		sentry: {
			dsn: optional('SENTRY_DSN'),
		},
	});
}

export const Config = loadConfig();

export type Config = z.infer<typeof ConfigSchema>;
