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

import {setTimeout as sleep} from 'node:timers/promises';
import {generateReportID, type ReportID, type UserID} from '@platewatch/api/src/BrandedTypes';
import {type Actor, actorKey, toActorRef} from '@platewatch/api/src/identity/Actor';
import {Logger} from '@platewatch/api/src/Logger';
import {Report} from '@platewatch/api/src/models/Report';
import {FAIL_CLOSED_VERDICT, type ModerationClient} from '@platewatch/api/src/moderation/ModerationClient';
import type {DuplicateGuard} from '@platewatch/api/src/report/DuplicateGuard';
import type {IReportRepository} from '@platewatch/api/src/report/IReportRepository';
import type {ReputationService} from '@platewatch/api/src/reputation/ReputationService';
import type {IUserRepository} from '@platewatch/api/src/user/IUserRepository';
import {
	PENDING_RECOVERY_BATCH_SIZE,
	type ReportOutcome,
	ReportStatuses,
} from '@platewatch/constants/src/ReportConstants';
import {InputValidationError} from '@platewatch/errors/src/domains/core/InputValidationError';
import {PersistenceError} from '@platewatch/errors/src/domains/core/PersistenceError';
import {ModerationUnavailableError} from '@platewatch/errors/src/domains/moderation/ModerationUnavailableError';
import {DuplicateReportError} from '@platewatch/errors/src/domains/report/DuplicateReportError';
import {ReporterBannedError} from '@platewatch/errors/src/domains/report/ReporterBannedError';
import type {ModerationVerdict} from '@platewatch/schema/src/domains/moderation/ModerationSchemas';
import {
	ReportCreateRequest,
	type ReportCreateRequestInput,
} from '@platewatch/schema/src/domains/report/ReportSchemas';

function outcomeOf(report: Report): ReportOutcome | null {
	return report.status === ReportStatuses.PENDING ? null : report.status;
}

export interface ReportServiceOptions {
	moderationMaxAttempts: number;
	moderationRetryBackoffMs: number;
	now?: () => Date;
	sleep?: (ms: number) => Promise<void>;
}

export class ReportService {
	private readonly now: () => Date;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(
		private readonly reportRepository: IReportRepository,
		private readonly userRepository: IUserRepository,
		private readonly duplicateGuard: DuplicateGuard,
		private readonly moderationClient: ModerationClient,
		private readonly reputationService: ReputationService,
		private readonly options: ReportServiceOptions,
	) {
		this.now = options.now ?? (() => new Date());
		this.sleep = options.sleep ?? ((ms) => sleep(ms));
	}

	/**
	 * Validates, de-duplicates, persists and moderates a report, returning it in its
	 * final state. Validation, ban and duplicate failures happen before anything is
	 * sent to the classifier.
	 */
	async submit(content: ReportCreateRequestInput, actor: Actor): Promise<Report> {
		const parsed = ReportCreateRequest.safeParse(content);
		if (!parsed.success) {
			throw InputValidationError.fromZodError(parsed.error);
		}
		const data = parsed.data;

		if (actor.kind === 'user') {
			await this.assertNotBanned(actor);
		}

		const actorRef = toActorRef(actor);
		const reportId = generateReportID();
		const claimed = await this.duplicateGuard.claim(data.plate_number, actorRef, data.violations, reportId);
		if (!claimed) {
			throw new DuplicateReportError(data.plate_number);
		}

		const createdAt = this.now();
		const pending = new Report({
			report_id: reportId,
			plate_number: data.plate_number,
			violations: data.violations,
			location: data.location,
			description: data.description,
			photo_url: data.photo_url,
			user_id: actorRef.kind === 'user' ? actorRef.userId : null,
			user_ip: actorRef.kind === 'anonymous' ? actorRef.ip : null,
			status: ReportStatuses.PENDING,
			moderation_approved: null,
			moderation_reason: null,
			moderation_confidence: null,
			moderation_flags: null,
			moderation_reviewed_at: null,
			reputation_recorded: false,
			created_at: createdAt,
			updated_at: createdAt,
		});

		try {
			await this.reportRepository.createPending(pending);
		} catch (error) {
			Logger.error({error, reportId}, 'Failed to persist pending report');
			await this.releaseClaim(pending);
			throw new PersistenceError('report', error);
		}

		Logger.info({reportId, plateNumber: data.plate_number, actor: actorKey(actorRef)}, 'Report accepted');
		const {report} = await this.settle(pending);
		return report;
	}

	/**
	 * Settles reports left unsettled for longer than `olderThanMs`: still pending, or final
	 * with the reporter's reputation outcome not yet recorded. Returns how many this call settled.
	 */
	async recoverPending(olderThanMs: number): Promise<number> {
		const cutoff = new Date(this.now().getTime() - olderThanMs);
		const reports = await this.reportRepository.listUnsettledOlderThan(cutoff, PENDING_RECOVERY_BATCH_SIZE);
		if (reports.length === 0) return 0;

		Logger.info({count: reports.length, cutoff: cutoff.toISOString()}, 'Recovering unsettled reports');
		let recovered = 0;
		for (const report of reports) {
			try {
				const {settled} = await this.settle(report);
				if (settled) recovered++;
			} catch (error) {
				Logger.error({error, reportId: report.id}, 'Failed to recover unsettled report');
			}
		}
		return recovered;
	}

	private async assertNotBanned(actor: Extract<Actor, {kind: 'user'}>): Promise<void> {
		const user = (await this.userRepository.findUnique(actor.user.id)) ?? actor.user;
		if (this.reputationService.isBanned(user)) {
			Logger.info({userId: user.id}, 'Banned reporter attempted a submission');
			throw new ReporterBannedError(user.banReason);
		}
	}

	private async releaseClaim(report: Report): Promise<void> {
		try {
			await this.duplicateGuard.release(report.plateNumber, report.actor, report.violations, report.id);
		} catch (error) {
			Logger.error({error, reportId: report.id}, 'Failed to release duplicate claim');
		}
	}

	/**
	 * Drives a report to its settled state. The report stays in the unsettled index
	 * until its outcome and the reporter's reputation update are both stored.
	 */
	private async settle(report: Report): Promise<{report: Report; settled: boolean}> {
		const current = report.isPending() ? await this.moderateAndFinalize(report) : report;
		const outcome = outcomeOf(current);
		if (outcome === null) {
			return {report: current, settled: false};
		}

		if (current.actor.kind === 'user' && !current.reputationRecorded) {
			const recorded = await this.recordReputation(current.id, current.actor.userId, outcome);
			if (!recorded) {
				return {report: current, settled: false};
			}
		}

		try {
			await this.reportRepository.markSettled(current);
		} catch (error) {
			Logger.error({error, reportId: current.id}, 'Failed to mark report settled');
			return {report: current, settled: false};
		}
		return {report: current, settled: true};
	}

	private async moderateAndFinalize(report: Report): Promise<Report> {
		const verdict = await this.moderateWithRetries(report);
		const outcome: ReportOutcome = verdict.approved ? ReportStatuses.APPROVED : ReportStatuses.REJECTED;
		const reviewedAt = this.now();

		const {applied, report: finalized} = await this.reportRepository.finalize({
			reportId: report.id,
			status: outcome,
			moderation: {...verdict, reviewedAt},
			updatedAt: reviewedAt,
		});
		if (!finalized) {
			throw new PersistenceError('report outcome');
		}
		if (!applied) {
			Logger.debug({reportId: report.id, status: finalized.status}, 'Report was already finalized');
			return finalized;
		}

		Logger.info({reportId: report.id, status: outcome, reason: verdict.reason}, 'Report finalized');
		return finalized;
	}

	/**
	 * Applies the outcome to the reporter under a claim on the report row, so concurrent
	 * workers apply it once. A failed update releases the claim for the next sweep.
	 */
	private async recordReputation(reportId: ReportID, userId: UserID, outcome: ReportOutcome): Promise<boolean> {
		try {
			if (!(await this.reportRepository.claimReputation(reportId))) {
				Logger.debug({reportId}, 'Reputation outcome already claimed');
				return false;
			}
		} catch (error) {
			Logger.error({error, reportId}, 'Failed to claim reputation outcome');
			return false;
		}

		try {
			await this.reputationService.recordOutcome(userId, outcome);
			return true;
		} catch (error) {
			Logger.error({error, reportId, userId, outcome}, 'Failed to record reputation outcome');
		}

		try {
			await this.reportRepository.releaseReputationClaim(reportId);
		} catch (error) {
			Logger.error({error, reportId}, 'Failed to release reputation claim');
		}
		return false;
	}

	private async moderateWithRetries(report: Report): Promise<ModerationVerdict> {
		const maxAttempts = Math.max(1, this.options.moderationMaxAttempts);
		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			try {
				return await this.moderationClient.moderate({
					plateNumber: report.plateNumber,
					violations: report.violations,
					location: report.location,
					description: report.description,
				});
			} catch (error) {
				Logger.warn(
					{
						reportId: report.id,
						attempt,
						failure: error instanceof ModerationUnavailableError ? error.failure : 'unknown',
						error,
					},
					'Moderation attempt failed',
				);
				if (attempt < maxAttempts) {
					await this.sleep(this.options.moderationRetryBackoffMs * 2 ** (attempt - 1));
				}
			}
		}

		Logger.warn({reportId: report.id, attempts: maxAttempts}, 'Moderation unavailable, rejecting report');
		return FAIL_CLOSED_VERDICT;
	}
}
