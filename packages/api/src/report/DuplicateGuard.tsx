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

import type {ReportID} from '@platewatch/api/src/BrandedTypes';
import {actorKey} from '@platewatch/api/src/identity/Actor';
import {Logger} from '@platewatch/api/src/Logger';
import type {ReportActorRef} from '@platewatch/api/src/models/Report';
import type {DuplicateClaim, IDuplicateClaimRepository} from '@platewatch/api/src/report/IDuplicateClaimRepository';

export interface DuplicateGuardOptions {
	windowMs: number;
	now?: () => Date;
}

/**
 * Suppresses repeat reports of one vehicle by one actor. A claim row exists per
 * `(plate, actor, violation)` for the length of the window; a new report overlapping
 * any live claim is a duplicate.
 */
export class DuplicateGuard {
	private readonly now: () => Date;

	constructor(
		private readonly claims: IDuplicateClaimRepository,
		private readonly options: DuplicateGuardOptions,
	) {
		this.now = options.now ?? (() => new Date());
	}

	async isDuplicate(
		plateNumber: string,
		actor: ReportActorRef,
		violations: ReadonlyArray<string>,
		windowMs: number = this.options.windowMs,
	): Promise<boolean> {
		const existing = await this.claims.listClaims(plateNumber, actorKey(actor));
		const cutoff = this.now().getTime() - windowMs;
		const wanted = new Set(violations);
		return existing.some((claim) => wanted.has(claim.violation) && claim.createdAt.getTime() > cutoff);
	}

	async claim(
		plateNumber: string,
		actor: ReportActorRef,
		violations: ReadonlyArray<string>,
		reportId: ReportID,
		windowMs: number = this.options.windowMs,
	): Promise<boolean> {
		const rows = this.toClaims(plateNumber, actor, violations, reportId, this.now());
		const applied = await this.claims.claimAll(rows, Math.max(1, Math.ceil(windowMs / 1000)));
		if (!applied) {
			Logger.info({plateNumber, actor: actorKey(actor), reportId}, 'Duplicate report suppressed');
		}
		return applied;
	}

	async release(
		plateNumber: string,
		actor: ReportActorRef,
		violations: ReadonlyArray<string>,
		reportId: ReportID,
	): Promise<void> {
		await this.claims.releaseAll(this.toClaims(plateNumber, actor, violations, reportId, this.now()));
	}

	private toClaims(
		plateNumber: string,
		actor: ReportActorRef,
		violations: ReadonlyArray<string>,
		reportId: ReportID,
		createdAt: Date,
	): Array<DuplicateClaim> {
		const key = actorKey(actor);
		return violations.map((violation) => ({plateNumber, actorKey: key, violation, reportId, createdAt}));
	}
}
