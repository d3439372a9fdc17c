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

import type {Actor} from '@platewatch/api/src/identity/Actor';
import type {IdentityResolver} from '@platewatch/api/src/identity/IdentityResolver';
import type {VerifiedIdentity} from '@platewatch/api/src/identity/IIdentityVerifier';
import type {User} from '@platewatch/api/src/models/User';
import type {ReportQueryService} from '@platewatch/api/src/report/ReportQueryService';
import type {ReportService} from '@platewatch/api/src/report/ReportService';
import type {UserService} from '@platewatch/api/src/user/UserService';
import type {Hono} from 'hono';

export interface HonoEnv {
	Variables: {
		reportService: ReportService;
		reportQueryService: ReportQueryService;
		userService: UserService;
		identityResolver: IdentityResolver;
		clientIp: string;
		actor: Actor;
		identity: VerifiedIdentity | null;
		verifiedIdentity: VerifiedIdentity;
		user: User;
	};
}

export type HonoApp = Hono<HonoEnv>;
