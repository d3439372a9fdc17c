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

export interface DuplicateClaim {
	plateNumber: string;
	actorKey: string;
	violation: string;
	reportId: ReportID;
	createdAt: Date;
}

export abstract class IDuplicateClaimRepository {
	/** Live (unexpired) claims in one `(plate, actor)` partition. */
	abstract listClaims(plateNumber: string, actorKey: string): Promise<Array<DuplicateClaim>>;

	/** Writes every claim or none. Returns false when any of them already exists. */
	abstract claimAll(claims: ReadonlyArray<DuplicateClaim>, ttlSeconds: number): Promise<boolean>;

	/** Removes the given claims if they still belong to their report. */
	abstract releaseAll(claims: ReadonlyArray<DuplicateClaim>): Promise<void>;
}
