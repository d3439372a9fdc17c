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
import {DuplicateClaimRepository} from '@platewatch/api/src/report/DuplicateClaimRepository';
import type {DuplicateClaim} from '@platewatch/api/src/report/IDuplicateClaimRepository';
import {cassandraStub, resultSet} from '@platewatch/api/src/test/mocks/FakeCassandraClient';
import {beforeEach, describe, expect, it, vi} from 'vitest';

vi.mock('cassandra-driver', async () => {
	const {FakeCassandraClient} = await import('@platewatch/api/src/test/mocks/FakeCassandraClient');
	return {default: {Client: FakeCassandraClient}};
});

const REPORT_ID = createReportID('3c9e1b7a-2d4f-4a6b-8e0c-1f2a3b4c5d01');
const CREATED_AT = new Date('2026-03-10T12:00:00.000Z');

function claim(violation: string): DuplicateClaim {
	return {plateNumber: 'KL07AB1234', actorKey: 'ip:1.2.3.4', violation, reportId: REPORT_ID, createdAt: CREATED_AT};
}

const CLAIM_CQL =
	'INSERT INTO report_duplicate_claims (plate_number, actor_key, violation, report_id, created_at) ' +
	'VALUES (:plate_number, :actor_key, :violation, :report_id, :created_at) IF NOT EXISTS USING TTL 86400;';

describe('DuplicateClaimRepository', () => {
	let repository: DuplicateClaimRepository;

	beforeEach(() => {
		cassandraStub.reset();
		repository = new DuplicateClaimRepository();
	});

	it('writes every claim in one conditional batch with the window as TTL', async () => {
		const applied = await repository.claimAll([claim('no_helmet'), claim('signal_jump')], 86400);

		expect(applied).toBe(true);
		expect(cassandraStub.batches).toEqual([
			{
				queries: [
					{
						query: CLAIM_CQL,
						params: {
							plate_number: 'KL07AB1234',
							actor_key: 'ip:1.2.3.4',
							violation: 'no_helmet',
							report_id: REPORT_ID,
							created_at: CREATED_AT,
						},
					},
					{
						query: CLAIM_CQL,
						params: {
							plate_number: 'KL07AB1234',
							actor_key: 'ip:1.2.3.4',
							violation: 'signal_jump',
							report_id: REPORT_ID,
							created_at: CREATED_AT,
						},
					},
				],
				options: {prepare: true, logged: true},
			},
		]);
	});

	it('reports a lost claim when any row already exists', async () => {
		cassandraStub.queueBatchResult(resultSet([{'[applied]': false, violation: 'signal_jump'}], false));

		expect(await repository.claimAll([claim('no_helmet'), claim('signal_jump')], 86400)).toBe(false);
	});

	it('releases claims only while they still belong to the report', async () => {
		await repository.releaseAll([claim('signal_jump')]);

		expect(cassandraStub.batches[0].queries).toEqual([
			{
				query:
					'DELETE FROM report_duplicate_claims\n' +
					'WHERE plate_number = :plate_number AND actor_key = :actor_key AND violation = :violation\n' +
					'IF report_id = :report_id;',
				params: {plate_number: 'KL07AB1234', actor_key: 'ip:1.2.3.4', violation: 'signal_jump', report_id: REPORT_ID},
			},
		]);
	});

	it('sends nothing when there is nothing to release', async () => {
		await repository.releaseAll([]);

		expect(cassandraStub.batches).toEqual([]);
	});

	it('lists the claims of one plate and actor', async () => {
		cassandraStub.on('FROM report_duplicate_claims', () =>
			resultSet([
				{
					plate_number: 'KL07AB1234',
					actor_key: 'ip:1.2.3.4',
					violation: 'signal_jump',
					report_id: REPORT_ID,
					created_at: CREATED_AT,
				},
			]),
		);

		expect(await repository.listClaims('KL07AB1234', 'ip:1.2.3.4')).toEqual([claim('signal_jump')]);
		expect(cassandraStub.executed).toEqual([
			{
				cql:
					'SELECT plate_number, actor_key, violation, report_id, created_at FROM report_duplicate_claims ' +
					'WHERE plate_number = :plate_number AND actor_key = :actor_key;',
				params: {plate_number: 'KL07AB1234', actor_key: 'ip:1.2.3.4'},
			},
		]);
	});
});
