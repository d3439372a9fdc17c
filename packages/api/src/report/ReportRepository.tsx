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
import {BatchBuilder, Db, executeConditional, executeQuery, fetchMany, fetchOne} from '@platewatch/api/src/database/Cassandra';
import type {
	ApprovedReportByMonthRow,
	PendingReportRow,
	ReportByPlateRow,
	ReportByUserRow,
	ReportCounterRow,
	ReportRow,
} from '@platewatch/api/src/database/types/ReportTypes';
import {Logger} from '@platewatch/api/src/Logger';
import {Report} from '@platewatch/api/src/models/Report';
import {
	type FinalizeReportParams,
	type FinalizeReportResult,
	IReportRepository,
	type ReportCounts,
} from '@platewatch/api/src/report/IReportRepository';
import {ApprovedReportsByMonth, PendingReports, Reports, ReportsByPlate, ReportsByUser} from '@platewatch/api/src/Tables';
import {dayKey, monthBucket} from '@platewatch/api/src/utils/TimeBuckets';
import {ReportStatuses} from '@platewatch/constants/src/ReportConstants';

const PENDING_SHARD = 0;
const PENDING_INDEX_COLUMNS = ['created_at', 'report_id'] as const;

type PendingIndexEntry = Pick<PendingReportRow, 'created_at' | 'report_id'>;

const FETCH_REPORT_BY_ID_CQL = Reports.selectCql({
	where: Reports.where.eq('report_id'),
	limit: 1,
});

const FETCH_REPORT_IDS_BY_PLATE_CQL = ReportsByPlate.selectCql({
	columns: ['report_id'],
	where: ReportsByPlate.where.eq('plate_number'),
});

const FETCH_REPORT_IDS_BY_USER_CQL = ReportsByUser.selectCql({
	columns: ['report_id'],
	where: ReportsByUser.where.eq('user_id'),
});

const FETCH_COUNTERS_CQL = 'SELECT name, value FROM report_counters WHERE name IN :names;';
const INCREMENT_COUNTER_CQL = 'UPDATE report_counters SET value = value + 1 WHERE name = :name;';

const COUNTER_TOTAL = 'total';

function createdCounterName(date: Date): string {
	return `created:${dayKey(date)}`;
}

export interface ReportRepositoryOptions {
	feedLookbackMonths: number;
}

export class ReportRepository extends IReportRepository {
	constructor(private readonly options: ReportRepositoryOptions) {
		super();
	}

	async findUnique(reportId: ReportID): Promise<Report | null> {
		const row = await fetchOne<ReportRow>(FETCH_REPORT_BY_ID_CQL, {report_id: reportId});
		return row ? new Report(row) : null;
	}

	async createPending(report: Report): Promise<Report> {
		const row = report.toRow();
		const batch = new BatchBuilder()
			.addPrepared(Reports.insert(row))
			.addPrepared(
				ReportsByPlate.insert({plate_number: row.plate_number, created_at: row.created_at, report_id: row.report_id}),
			)
			.addPrepared(PendingReports.insert({shard: PENDING_SHARD, created_at: row.created_at, report_id: row.report_id}));
		if (row.user_id) {
			batch.addPrepared(ReportsByUser.insert({user_id: row.user_id, created_at: row.created_at, report_id: row.report_id}));
		}
		await batch.execute();

		await this.incrementCounters([COUNTER_TOTAL, createdCounterName(row.created_at)], row.report_id);
		return report;
	}

	async finalize(params: FinalizeReportParams): Promise<FinalizeReportResult> {
		const {reportId, status, moderation, updatedAt} = params;
		const result = await executeConditional(
			Reports.patchByPkIf(
				{report_id: reportId},
				{
					status: Db.set(status),
					moderation_approved: Db.set(moderation.approved),
					moderation_reason: Db.set(moderation.reason),
					moderation_confidence: Db.set(moderation.confidence),
					moderation_flags: Db.set([...moderation.flags]),
					moderation_reviewed_at: Db.set(moderation.reviewedAt),
					updated_at: Db.set(updatedAt),
				},
				{col: 'status', expectedParam: 'expected_status', expectedValue: ReportStatuses.PENDING},
			),
		);

		if (result.applied) {
			await this.incrementCounters([status], reportId);
		}
		return {applied: result.applied, report: await this.findUnique(reportId)};
	}

	async claimReputation(reportId: ReportID): Promise<boolean> {
		const {applied} = await executeConditional(
			Reports.patchByPkIf(
				{report_id: reportId},
				{reputation_recorded: Db.set(true)},
				{col: 'reputation_recorded', expectedParam: 'expected_recorded', expectedValue: false},
			),
		);
		return applied;
	}

	async releaseReputationClaim(reportId: ReportID): Promise<void> {
		await executeConditional(
			Reports.patchByPkIf(
				{report_id: reportId},
				{reputation_recorded: Db.set(false)},
				{col: 'reputation_recorded', expectedParam: 'expected_recorded', expectedValue: true},
			),
		);
	}

	async markSettled(report: Report): Promise<void> {
		await new BatchBuilder()
			.addPreparedIf(
				report.status === ReportStatuses.APPROVED,
				ApprovedReportsByMonth.insert({
					bucket: monthBucket(report.createdAt),
					created_at: report.createdAt,
					report_id: report.id,
				}),
			)
			.addPrepared(PendingReports.deleteByPk({shard: PENDING_SHARD, created_at: report.createdAt, report_id: report.id}))
			.execute();
	}

	async listApproved(params: {limit: number; offset: number; now: Date}): Promise<Array<Report>> {
		const wanted = params.offset + params.limit;
		const ids: Array<ReportID> = [];
		let bucket = monthBucket(params.now);
		const oldestBucket = bucket - this.options.feedLookbackMonths;

		while (ids.length < wanted && bucket > oldestBucket) {
			const rows = await fetchMany<Pick<ApprovedReportByMonthRow, 'report_id'>>(
				ApprovedReportsByMonth.selectCql({
					columns: ['report_id'],
					where: ApprovedReportsByMonth.where.eq('bucket'),
					limit: wanted - ids.length,
				}),
				{bucket},
			);
			for (const row of rows) ids.push(row.report_id);
			bucket--;
		}

		return this.fetchReports(ids.slice(params.offset, wanted));
	}

	async listByPlate(plateNumber: string): Promise<Array<Report>> {
		const rows = await fetchMany<Pick<ReportByPlateRow, 'report_id'>>(FETCH_REPORT_IDS_BY_PLATE_CQL, {
			plate_number: plateNumber,
		});
		return this.fetchReports(rows.map((row) => row.report_id));
	}

	async listByUser(userId: UserID): Promise<Array<Report>> {
		const rows = await fetchMany<Pick<ReportByUserRow, 'report_id'>>(FETCH_REPORT_IDS_BY_USER_CQL, {
			user_id: userId,
		});
		return this.fetchReports(rows.map((row) => row.report_id));
	}

	async listUnsettledOlderThan(cutoff: Date, limit: number): Promise<Array<Report>> {
		const unsettled: Array<Report> = [];
		const seen = new Set<ReportID>();
		let after: Date | null = null;

		while (unsettled.length < limit) {
			const rows = await this.fetchPendingIndexPage(cutoff, after, limit);
			const fresh = rows.filter((row) => !seen.has(row.report_id));
			for (const row of fresh) {
				if (unsettled.length >= limit) break;
				seen.add(row.report_id);
				const report = await this.findUnique(row.report_id);
				if (report && !report.isSettled()) {
					unsettled.push(report);
				} else {
					await this.dropStaleIndexEntry(row, report);
				}
			}
			if (fresh.length === 0 || rows.length < limit) break;
			after = rows[rows.length - 1].created_at;
		}

		return unsettled;
	}

	async getCounts(now: Date): Promise<ReportCounts> {
		const todayCounter = createdCounterName(now);
		const rows = await fetchMany<ReportCounterRow>(FETCH_COUNTERS_CQL, {
			names: [COUNTER_TOTAL, ReportStatuses.APPROVED, ReportStatuses.REJECTED, todayCounter],
		});
		const values = new Map(rows.map((row) => [row.name, Number(row.value ?? 0)]));
		return {
			total: values.get(COUNTER_TOTAL) ?? 0,
			approved: values.get(ReportStatuses.APPROVED) ?? 0,
			rejected: values.get(ReportStatuses.REJECTED) ?? 0,
			today: values.get(todayCounter) ?? 0,
		};
	}

	private async fetchReports(ids: ReadonlyArray<ReportID>): Promise<Array<Report>> {
		const reports = await Promise.all(ids.map((reportId) => this.findUnique(reportId)));
		return reports.filter((report): report is Report => report !== null);
	}

	private async fetchPendingIndexPage(cutoff: Date, after: Date | null, limit: number): Promise<Array<PendingIndexEntry>> {
		if (after === null) {
			return fetchMany<PendingIndexEntry>(
				PendingReports.selectCql({
					columns: PENDING_INDEX_COLUMNS,
					where: [PendingReports.where.eq('shard'), PendingReports.where.lt('created_at', 'cutoff')],
					limit,
				}),
				{shard: PENDING_SHARD, cutoff},
			);
		}
		return fetchMany<PendingIndexEntry>(
			PendingReports.selectCql({
				columns: PENDING_INDEX_COLUMNS,
				where: [
					PendingReports.where.eq('shard'),
					PendingReports.where.gte('created_at', 'after'),
					PendingReports.where.lt('created_at', 'cutoff'),
				],
				limit,
			}),
			{shard: PENDING_SHARD, after, cutoff},
		);
	}

	private async dropStaleIndexEntry(entry: PendingIndexEntry, report: Report | null): Promise<void> {
		try {
			if (report) {
				await this.markSettled(report);
			} else {
				await executeQuery(
					PendingReports.deleteByPk({shard: PENDING_SHARD, created_at: entry.created_at, report_id: entry.report_id}),
				);
			}
		} catch (error) {
			Logger.warn({error, reportId: entry.report_id}, 'Failed to drop stale pending index entry');
		}
	}

	private async incrementCounters(names: ReadonlyArray<string>, reportId: ReportID): Promise<void> {
		for (const name of names) {
			try {
				await executeQuery(INCREMENT_COUNTER_CQL, {name});
			} catch (error) {
				Logger.error({error, reportId, counter: name}, 'Failed to increment report counter');
			}
		}
	}
}
