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

import {executeConditionalBatch, fetchMany, prepared} from '@platewatch/api/src/database/Cassandra';
import type {DuplicateClaimRow} from '@platewatch/api/src/database/types/ReportTypes';
import {type DuplicateClaim, IDuplicateClaimRepository} from '@platewatch/api/src/report/IDuplicateClaimRepository';
import {ReportDuplicateClaims} from '@platewatch/api/src/Tables';

const FETCH_CLAIMS_CQL = ReportDuplicateClaims.selectCql({
	where: [ReportDuplicateClaims.where.eq('plate_number'), ReportDuplicateClaims.where.eq('actor_key')],
});

const RELEASE_CLAIM_CQL = `DELETE FROM report_duplicate_claims
WHERE plate_number = :plate_number AND actor_key = :actor_key AND violation = :violation
IF report_id = :report_id;`;

function toRow(claim: DuplicateClaim): DuplicateClaimRow {
	return {
		plate_number: claim.plateNumber,
		actor_key: claim.actorKey,
		violation: claim.violation,
		report_id: claim.reportId,
		created_at: claim.createdAt,
	};
}

export class DuplicateClaimRepository extends IDuplicateClaimRepository {
	async listClaims(plateNumber: string, actorKey: string): Promise<Array<DuplicateClaim>> {
		const rows = await fetchMany<DuplicateClaimRow>(FETCH_CLAIMS_CQL, {plate_number: plateNumber, actor_key: actorKey});
		return rows.map((row) => ({
			plateNumber: row.plate_number,
			actorKey: row.actor_key,
			violation: row.violation,
			reportId: row.report_id,
			createdAt: row.created_at,
		}));
	}

	async claimAll(claims: ReadonlyArray<DuplicateClaim>, ttlSeconds: number): Promise<boolean> {
		const {applied} = await executeConditionalBatch(
			claims.map((claim) => ReportDuplicateClaims.insertIfNotExistsWithTtl(toRow(claim), ttlSeconds)),
		);
		return applied;
	}

	async releaseAll(claims: ReadonlyArray<DuplicateClaim>): Promise<void> {
		if (claims.length === 0) return;
		await executeConditionalBatch(
			claims.map((claim) =>
				prepared(RELEASE_CLAIM_CQL, {
					plate_number: claim.plateNumber,
					actor_key: claim.actorKey,
					violation: claim.violation,
					report_id: claim.reportId,
				}),
			),
		);
	}
}
