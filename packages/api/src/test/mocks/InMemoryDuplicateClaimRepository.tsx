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

import {type DuplicateClaim, IDuplicateClaimRepository} from '@platewatch/api/src/report/IDuplicateClaimRepository';

interface StoredClaim {
	claim: DuplicateClaim;
	expiresAt: number;
}

function claimKey(claim: Pick<DuplicateClaim, 'plateNumber' | 'actorKey' | 'violation'>): string {
	return `${claim.plateNumber}|${claim.actorKey}|${claim.violation}`;
}

/** Emulates the TTL'd claim table: claims vanish once `now()` passes their expiry. */
export class InMemoryDuplicateClaimRepository extends IDuplicateClaimRepository {
	private readonly claims = new Map<string, StoredClaim>();

	constructor(private readonly now: () => number = () => Date.now()) {
		super();
	}

	async listClaims(plateNumber: string, actorKey: string): Promise<Array<DuplicateClaim>> {
		return this.live()
			.filter((stored) => stored.claim.plateNumber === plateNumber && stored.claim.actorKey === actorKey)
			.map((stored) => stored.claim);
	}

	async claimAll(claims: ReadonlyArray<DuplicateClaim>, ttlSeconds: number): Promise<boolean> {
		const now = this.now();
		if (claims.some((claim) => this.isLive(this.claims.get(claimKey(claim)), now))) {
			return false;
		}
		for (const claim of claims) {
			this.claims.set(claimKey(claim), {claim, expiresAt: now + ttlSeconds * 1000});
		}
		return true;
	}

	async releaseAll(claims: ReadonlyArray<DuplicateClaim>): Promise<void> {
		for (const claim of claims) {
			const key = claimKey(claim);
			if (this.claims.get(key)?.claim.reportId === claim.reportId) {
				this.claims.delete(key);
			}
		}
	}

	liveCount(): number {
		return this.live().length;
	}

	private live(): Array<StoredClaim> {
		const now = this.now();
		return Array.from(this.claims.values()).filter((stored) => this.isLive(stored, now));
	}

	private isLive(stored: StoredClaim | undefined, now: number): boolean {
		return stored !== undefined && stored.expiresAt > now;
	}
}
