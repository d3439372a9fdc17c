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

import type {IClassifierTransport} from '@platewatch/api/src/moderation/IClassifierTransport';
import {buildModerationPrompt, type ModerationContent} from '@platewatch/api/src/moderation/ModerationPrompt';
import {MODERATION_UNAVAILABLE_REASON} from '@platewatch/constants/src/ReportConstants';
import {ModerationUnavailableError} from '@platewatch/errors/src/domains/moderation/ModerationUnavailableError';
import {ModerationVerdict} from '@platewatch/schema/src/domains/moderation/ModerationSchemas';

export const FAIL_CLOSED_VERDICT: ModerationVerdict = {
	approved: false,
	reason: MODERATION_UNAVAILABLE_REASON,
	confidence: 0,
	flags: [MODERATION_UNAVAILABLE_REASON],
};

const CODE_FENCE_PATTERN = /^```[a-zA-Z]*[^\S\n]*\n?([\s\S]*?)\n?```$/;

export function parseModerationReply(reply: string): ModerationVerdict {
	const trimmed = reply.trim();
	const fenced = CODE_FENCE_PATTERN.exec(trimmed);
	const body = fenced ? fenced[1].trim() : trimmed;

	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch (error) {
		throw new ModerationUnavailableError('parse', 'Classifier reply is not valid JSON', error);
	}

	const result = ModerationVerdict.safeParse(parsed);
	if (!result.success) {
		throw new ModerationUnavailableError('parse', 'Classifier reply does not match the verdict schema', result.error);
	}
	return result.data;
}

export interface ModerationClientOptions {
	timeoutMs: number;
}

export class ModerationClient {
	constructor(
		private readonly transport: IClassifierTransport,
		private readonly options: ModerationClientOptions,
	) {}

	async moderate(content: ModerationContent): Promise<ModerationVerdict> {
		const reply = await this.complete(buildModerationPrompt(content));
		return parseModerationReply(reply);
	}

	private async complete(prompt: string): Promise<string> {
		const controller = new AbortController();
		let timer: NodeJS.Timeout | undefined;
		const deadline = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				controller.abort();
				reject(
					new ModerationUnavailableError(
						'timeout',
						`Classifier did not answer within ${this.options.timeoutMs}ms`,
					),
				);
			}, this.options.timeoutMs);
		});

		try {
			return await Promise.race([this.transport.complete(prompt, {signal: controller.signal}), deadline]);
		} catch (error) {
			if (error instanceof ModerationUnavailableError) throw error;
			throw new ModerationUnavailableError('transport', 'Classifier request failed', error);
		} finally {
			clearTimeout(timer);
		}
	}
}
