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

import Anthropic from '@anthropic-ai/sdk';
import type {ClassifierRequestOptions, IClassifierTransport} from '@platewatch/api/src/moderation/IClassifierTransport';
import {ModerationUnavailableError} from '@platewatch/errors/src/domains/moderation/ModerationUnavailableError';

export interface AnthropicClassifierOptions {
	apiKey: string;
	model: string;
	maxOutputTokens: number;
	timeoutMs: number;
}

export class AnthropicClassifierTransport implements IClassifierTransport {
	private readonly client: Anthropic;

	constructor(private readonly options: AnthropicClassifierOptions) {
		this.client = new Anthropic({
			apiKey: options.apiKey,
			timeout: options.timeoutMs,
			maxRetries: 0,
		});
	}

	async complete(prompt: string, options: ClassifierRequestOptions = {}): Promise<string> {
		try {
			const message = await this.client.messages.create(
				{
					model: this.options.model,
					max_tokens: this.options.maxOutputTokens,
					messages: [{role: 'user', content: prompt}],
				},
				{signal: options.signal},
			);
			const block = message.content.find((candidate) => candidate.type === 'text');
			if (!block || block.type !== 'text') {
				throw new ModerationUnavailableError('parse', 'Classifier reply has no text content');
			}
			return block.text;
		} catch (error) {
			if (error instanceof ModerationUnavailableError) throw error;
			if (error instanceof Anthropic.APIConnectionTimeoutError) {
				throw new ModerationUnavailableError('timeout', 'Classifier request timed out', error);
			}
			throw new ModerationUnavailableError('transport', 'Classifier request failed', error);
		}
	}
}
