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

import {APIErrorCodes} from '@platewatch/constants/src/ApiErrorCodes';
import {PlateWatchError} from '@platewatch/errors/src/PlateWatchError';

export type ModerationFailureCause = 'parse' | 'transport' | 'timeout';

/** Raised by the moderation client; the report pipeline absorbs it into a rejected outcome. */
export class ModerationUnavailableError extends PlateWatchError {
	readonly failure: ModerationFailureCause;

	constructor(failure: ModerationFailureCause, message: string, cause?: unknown) {
		super({
			code: APIErrorCodes.MODERATION_UNAVAILABLE,
			status: 503,
			message,
			isExpected: false,
			cause,
		});
		this.failure = failure;
	}
}
