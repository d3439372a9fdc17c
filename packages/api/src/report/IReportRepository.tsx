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

import type {ReportID, UserID} from '@platewatch/api/src/BrandedTypes';
import type {ModerationResult, Report} from '@platewatch/api/src/models/Report';
import type {ReportOutcome} from '@platewatch/constants/src/ReportConstants';

export interface ReportCounts {
	total: number;
	approved: number;
	rejected: number;
	today: number;
}

export interface FinalizeReportParams {
	reportId: ReportID;
	status: ReportOutcome;
	moderation: ModerationResult;
	updatedAt: Date;
}

export interface FinalizeReportResult {
	applied: boolean;
	report: Report | null;
}

export abstract class IReportRepository {
	/** Stores a pending report and enters it in the unsettled index. */
	abstract createPending(report: Report): Promise<Report>;

	/** Moves a pending report to its outcome; `applied` is false when it was no longer pending. */
	abstract finalize(params: FinalizeReportParams): Promise<FinalizeReportResult>;

	/** Marks the reporter's reputation outcome as taken. False when another worker already took it. */
	abstract claimReputation(reportId: ReportID): Promise<boolean>;

	abstract releaseReputationClaim(reportId: ReportID): Promise<void>;

	/** Writes the feed index for approved reports and drops the report from the unsettled index. */
	abstract markSettled(report: Report): Promise<void>;

	abstract findUnique(reportId: ReportID): Promise<Report | null>;

	abstract listApproved(params: {limit: number; offset: number; now: Date}): Promise<Array<Report>>;

	abstract listByPlate(plateNumber: string): Promise<Array<Report>>;

	abstract listByUser(userId: UserID): Promise<Array<Report>>;

	/**
	 * Oldest reports created before `cutoff` that still need moderation or a reputation write.
	 * Index entries for reports that are already settled are removed along the way.
	 */
	abstract listUnsettledOlderThan(cutoff: Date, limit: number): Promise<Array<Report>>;

	abstract getCounts(now: Date): Promise<ReportCounts>;
}
