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

import type {UserID} from '@platewatch/api/src/BrandedTypes';
import {Logger} from '@platewatch/api/src/Logger';
import type {ReputationState, User} from '@platewatch/api/src/models/User';
import type {IUserRepository} from '@platewatch/api/src/user/IUserRepository';
import {type ReportOutcome, ReportStatuses} from '@platewatch/constants/src/ReportConstants';
import {
	REPUTATION_APPROVED_REWARD,
	REPUTATION_AUTO_BAN_REASON,
	REPUTATION_BAN_THRESHOLD,
	REPUTATION_MAX_SCORE,
	REPUTATION_REJECTED_PENALTY,
} from '@platewatch/constants/src/ReputationConstants';

export function applyOutcome(state: ReputationState, outcome: ReportOutcome): ReputationState {
	const approved = outcome === ReportStatuses.APPROVED;
	const reputationScore = approved
		? Math.min(REPUTATION_MAX_SCORE, state.reputationScore + REPUTATION_APPROVED_REWARD)
		: state.reputationScore - REPUTATION_REJECTED_PENALTY;
	const crossesThreshold = !state.isBanned && reputationScore < REPUTATION_BAN_THRESHOLD;

	return {
		totalReports: state.totalReports + 1,
		approvedReports: state.approvedReports + (approved ? 1 : 0),
		rejectedReports: state.rejectedReports + (approved ? 0 : 1),
		reputationScore,
		isBanned: state.isBanned || crossesThreshold,
		banReason: crossesThreshold ? REPUTATION_AUTO_BAN_REASON : state.banReason,
	};
}

export class ReputationService {
	constructor(private readonly userRepository: IUserRepository) {}

	async recordOutcome(userId: UserID, outcome: ReportOutcome): Promise<User> {
		let banned = false;
		const user = await this.userRepository.applyReputationUpdate(userId, (current) => {
			const next = applyOutcome(current, outcome);
			banned = next.isBanned && !current.isBanned;
			return next;
		});

		Logger.debug({userId, outcome, reputationScore: user.reputationScore}, 'Reputation updated');
		if (banned) {
			Logger.warn({userId, reputationScore: user.reputationScore}, 'Reporter automatically banned');
		}
		return user;
	}

	isBanned(user: User): boolean {
		return user.isBanned;
	}
}
