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

export interface PlateWatchErrorOptions {
	code: string;
	status: number;
	message?: string;
	data?: Record<string, unknown>;
	isExpected?: boolean;
	cause?: unknown;
}

export class PlateWatchError extends Error {
	readonly code: string;
	readonly status: number;
	readonly data: Record<string, unknown> | undefined;
	readonly isExpected: boolean;

	constructor(options: PlateWatchErrorOptions) {
		super(options.message ?? options.code, options.cause === undefined ? undefined : {cause: options.cause});
		this.name = new.target.name;
		this.code = options.code;
		this.status = options.status;
		this.data = options.data;
		this.isExpected = options.isExpected ?? options.status < 500;
	}

	toJSON(): Record<string, unknown> {
		return {
			code: this.code,
			message: this.message,
			...this.data,
		};
	}
}
