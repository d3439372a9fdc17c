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
import {createIdentityVerifier} from '@platewatch/api/src/identity/FirebaseIdentityVerifier';
import {IdentityResolver} from '@platewatch/api/src/identity/IdentityResolver';
import type {Services} from '@platewatch/api/src/middleware/ServiceMiddleware';
import {AnthropicClassifierTransport} from '@platewatch/api/src/moderation/AnthropicClassifierTransport';
import {ModerationClient} from '@platewatch/api/src/moderation/ModerationClient';
import {DuplicateClaimRepository} from '@platewatch/api/src/report/DuplicateClaimRepository';
import {DuplicateGuard} from '@platewatch/api/src/report/DuplicateGuard';
import {ReportQueryService} from '@platewatch/api/src/report/ReportQueryService';
import {ReportRepository} from '@platewatch/api/src/report/ReportRepository';
import {ReportService} from '@platewatch/api/src/report/ReportService';
import {ReputationService} from '@platewatch/api/src/reputation/ReputationService';
import {UserRepository} from '@platewatch/api/src/user/UserRepository';
import {UserService} from '@platewatch/api/src/user/UserService';
import {duplicateWindowSeconds} from '@platewatch/constants/src/ReportConstants';

export function createServices(config: Config): Services {
	const reportRepository = new ReportRepository({feedLookbackMonths: config.reports.feedLookbackMonths});
	const userRepository = new UserRepository();

	const moderationClient = new ModerationClient(
		new AnthropicClassifierTransport({
			apiKey: config.moderation.apiKey,
			model: config.moderation.model,
			maxOutputTokens: config.moderation.maxOutputTokens,
			timeoutMs: config.moderation.timeoutMs,
		}),
		{timeoutMs: config.moderation.timeoutMs},
	);

	const duplicateGuard = new DuplicateGuard(new DuplicateClaimRepository(), {
		windowMs: duplicateWindowSeconds(config.reports.duplicateWindowHours) * 1000,
	});

	const reportService = new ReportService(
		reportRepository,
		userRepository,
		duplicateGuard,
		moderationClient,
		new ReputationService(userRepository),
		{
			moderationMaxAttempts: config.moderation.maxAttempts,
			moderationRetryBackoffMs: config.moderation.retryBackoffMs,
		},
	);

	return {
		reportService,
		reportQueryService: new ReportQueryService(reportRepository),
		userService: new UserService(userRepository),
		identityResolver: new IdentityResolver(createIdentityVerifier(config.firebase), userRepository),
	};
}
