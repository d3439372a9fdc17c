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

import type {UserID} from '@platewatch/api/src/BrandedTypes';
import type {Report} from '@platewatch/api/src/models/Report';
import type {IReportRepository} from '@platewatch/api/src/report/IReportRepository';
import {mapReportToResponse} from '@platewatch/api/src/report/ReportMappers';
import {
	ReportStatuses,
	SAFETY_SCORE_MAX,
	SAFETY_SCORE_PENALTY_PER_REPORT,
} from '@platewatch/constants/src/ReportConstants';
import type {
	PlateReportScope,
	PlateReportsResponse,
	ReportListResponse,
	ReportStatsResponse,
} from '@platewatch/schema/src/domains/report/ReportSchemas';
import type {UserReportsResponse} from '@platewatch/schema/src/domains/user/UserSchemas';
import {normalizePlateNumber} from '@platewatch/schema/src/primitives/ReportValidators';

function newestFirst(reports: Array<Report>): Array<Report> {
	return reports.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}

export function computeSafetyScore(approvedReports: number): number {
	return Math.max(0, SAFETY_SCORE_MAX - SAFETY_SCORE_PENALTY_PER_REPORT * approvedReports);
}

export function countViolations(reports: ReadonlyArray<Report>): Record<string, number> {
	const breakdown: Record<string, number> = {};
	for (const report of reports) {
		for (const violation of report.violations) {
			breakdown[violation] = (breakdown[violation] ?? 0) + 1;
		}
	}
	return breakdown;
}

export class ReportQueryService {
	private readonly now: () => Date;

	constructor(
		private readonly reportRepository: IReportRepository,
		options: {now?: () => Date} = {},
	) {
		this.now = options.now ?? (() => new Date());
	}

	async listApproved(params: {limit: number; offset: number}): Promise<ReportListResponse> {
		const now = this.now();
		const [reports, counts] = await Promise.all([
			this.reportRepository.listApproved({limit: params.limit, offset: params.offset, now}),
			this.reportRepository.getCounts(now),
		]);
		return {
			reports: reports.map(mapReportToResponse),
			total: counts.approved,
			limit: params.limit,
			offset: params.offset,
		};
	}

	async listByPlate(plateNumber: string, params: {scope: PlateReportScope}): Promise<PlateReportsResponse> {
		const normalized = normalizePlateNumber(plateNumber);
		const all = newestFirst(await this.reportRepository.listByPlate(normalized));
		const approved = all.filter((report) => report.status === ReportStatuses.APPROVED);
		const reports = params.scope === 'all' ? all : approved;

		return {
			plate_number: normalized,
			scope: params.scope,
			total_reports: reports.length,
			reports: reports.map(mapReportToResponse),
			violation_breakdown: countViolations(reports),
			safety_score: computeSafetyScore(approved.length),
		};
	}

	async listByUser(userId: UserID): Promise<UserReportsResponse> {
		const reports = newestFirst(await this.reportRepository.listByUser(userId));
		return {reports: reports.map(mapReportToResponse), total: reports.length};
	}

	async getStats(): Promise<ReportStatsResponse> {
		const counts = await this.reportRepository.getCounts(this.now());
		const pending = Math.max(0, counts.total - counts.approved - counts.rejected);
		const approvalRate = counts.total === 0 ? 0 : Math.round((counts.approved / counts.total) * 10000) / 100;
		return {
			total: counts.total,
			approved: counts.approved,
			rejected: counts.rejected,
			pending,
			today: counts.today,
			approval_rate: approvalRate,
		};
	}
}
