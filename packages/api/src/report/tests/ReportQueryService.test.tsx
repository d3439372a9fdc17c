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

import {createReportID, createUserID} from '@platewatch/api/src/BrandedTypes';
import type {ReportRow} from '@platewatch/api/src/database/types/ReportTypes';
import {computeSafetyScore, ReportQueryService} from '@platewatch/api/src/report/ReportQueryService';
import {InMemoryReportRepository} from '@platewatch/api/src/test/mocks/InMemoryReportRepository';
import {TestClock} from '@platewatch/api/src/test/TestHarness';
import type {ReportStatus} from '@platewatch/constants/src/ReportConstants';
import {ms} from 'itty-time';
import {beforeEach, describe, expect, it} from 'vitest';

const REPORTER = createUserID('7c9e6679-7425-40de-944b-e07fc1f90ae7');

let sequence = 0;

function reportRow(status: ReportStatus, overrides: Partial<ReportRow> = {}): ReportRow {
	sequence++;
	const createdAt = overrides.created_at ?? new Date(Date.parse('2026-03-10T08:00:00.000Z') + sequence * 1000);
	const reviewed = status !== 'pending';
	return {
		report_id: createReportID(`00000000-0000-4000-8000-${String(sequence).padStart(12, '0')}`),
		plate_number: 'KL07AB1234',
		violations: ['signal_jump'],
		location: 'Kochi',
		description: null,
		photo_url: null,
		user_id: null,
		user_ip: '1.2.3.4',
		status,
		moderation_approved: reviewed ? status === 'approved' : null,
		moderation_reason: reviewed ? 'Reviewed' : null,
		moderation_confidence: reviewed ? 0.9 : null,
		moderation_flags: reviewed ? [] : null,
		moderation_reviewed_at: reviewed ? createdAt : null,
		reputation_recorded: false,
		created_at: createdAt,
		updated_at: createdAt,
		...overrides,
	};
}

describe('ReportQueryService', () => {
	let clock: TestClock;
	let repository: InMemoryReportRepository;
	let service: ReportQueryService;

	beforeEach(() => {
		clock = new TestClock();
		repository = new InMemoryReportRepository();
		service = new ReportQueryService(repository, {now: clock.now});
	});

	describe('listByPlate', () => {
		beforeEach(() => {
			repository.insert(reportRow('approved', {violations: ['signal_jump', 'no_helmet']}));
			repository.insert(reportRow('approved', {violations: ['no_helmet']}));
			repository.insert(reportRow('rejected', {violations: ['wrong_side']}));
			repository.insert(reportRow('pending', {violations: ['signal_jump']}));
			repository.insert(reportRow('approved', {plate_number: 'KL09XY0001'}));
		});

		it('returns approved reports by default, newest first', async () => {
			const result = await service.listByPlate('kl 07 ab 1234', {scope: 'approved'});

			expect(result.plate_number).toBe('KL07AB1234');
			expect(result.scope).toBe('approved');
			expect(result.total_reports).toBe(2);
			expect(result.reports.map((report) => report.violations)).toEqual([['no_helmet'], ['signal_jump', 'no_helmet']]);
			expect(result.violation_breakdown).toEqual({signal_jump: 1, no_helmet: 2});
			expect(result.safety_score).toBe(80);
		});

		it('includes every status when asked for all reports', async () => {
			const result = await service.listByPlate('KL07AB1234', {scope: 'all'});

			expect(result.total_reports).toBe(4);
			expect(result.reports.map((report) => report.status)).toEqual(['pending', 'rejected', 'approved', 'approved']);
			expect(result.violation_breakdown).toEqual({signal_jump: 2, no_helmet: 2, wrong_side: 1});
			expect(result.safety_score).toBe(80);
		});

		it('returns an empty history for an unknown plate', async () => {
			const result = await service.listByPlate('TN01ZZ9999', {scope: 'all'});

			expect(result).toEqual({
				plate_number: 'TN01ZZ9999',
				scope: 'all',
				total_reports: 0,
				reports: [],
				violation_breakdown: {},
				safety_score: 100,
			});
		});
	});

	it('floors the safety score at zero', () => {
		expect(computeSafetyScore(0)).toBe(100);
		expect(computeSafetyScore(10)).toBe(0);
		expect(computeSafetyScore(11)).toBe(0);
	});

	describe('getStats', () => {
		it('reports zeros for an empty store', async () => {
			expect(await service.getStats()).toEqual({
				total: 0,
				approved: 0,
				rejected: 0,
				pending: 0,
				today: 0,
				approval_rate: 0,
			});
		});

		it('derives pending and the approval rate from the counters', async () => {
			repository.insert(reportRow('approved'));
			repository.insert(reportRow('rejected'));
			repository.insert(reportRow('pending'));

			expect(await service.getStats()).toEqual({
				total: 3,
				approved: 1,
				rejected: 1,
				pending: 1,
				today: 3,
				approval_rate: 33.33,
			});
		});

		it('counts today against the UTC day of the clock', async () => {
			repository.insert(reportRow('approved', {created_at: new Date('2026-03-09T23:59:59.000Z')}));
			repository.insert(reportRow('approved', {created_at: new Date('2026-03-10T00:00:00.000Z')}));

			expect((await service.getStats()).today).toBe(1);
			expect((await service.getStats()).approval_rate).toBe(100);

			clock.advance(ms('1 day'));
			expect((await service.getStats()).today).toBe(0);
		});

		it('rounds a half approval rate to 50', async () => {
			repository.insert(reportRow('approved'));
			repository.insert(reportRow('rejected'));

			expect((await service.getStats()).approval_rate).toBe(50);
		});
	});

	it('pages through approved reports with the approved total', async () => {
		for (let i = 0; i < 5; i++) {
			repository.insert(reportRow('approved', {location: `Stop ${i}`}));
		}
		repository.insert(reportRow('rejected'));

		const page = await service.listApproved({limit: 2, offset: 1});

		expect(page.total).toBe(5);
		expect(page.limit).toBe(2);
		expect(page.offset).toBe(1);
		expect(page.reports.map((report) => report.location)).toEqual(['Stop 3', 'Stop 2']);
	});

	it('lists the reports of one user', async () => {
		repository.insert(reportRow('approved', {user_id: REPORTER, user_ip: null, location: 'First'}));
		repository.insert(reportRow('pending', {user_id: REPORTER, user_ip: null, location: 'Second'}));
		repository.insert(reportRow('approved'));

		const result = await service.listByUser(REPORTER);

		expect(result.total).toBe(2);
		expect(result.reports.map((report) => report.location)).toEqual(['Second', 'First']);
		expect(result.reports[0]).toMatchObject({user_id: REPORTER, status: 'pending', moderation: null});
	});
});
