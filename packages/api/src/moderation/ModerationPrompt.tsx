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

export interface ModerationContent {
	plateNumber: string;
	violations: ReadonlyArray<string>;
	location: string;
	description: string | null;
}

const INSTRUCTIONS = `You review citizen reports of traffic violations before they are published.
Decide whether the report below is a plausible, good-faith account of a traffic violation.
Reject it when it is spam, abusive, targets a person rather than a vehicle, contains personal
data beyond the plate number, or describes something that is not a traffic violation.

Answer with a single JSON object and nothing else, using exactly these keys:
{"approved": boolean, "reason": string, "confidence": number between 0 and 1, "flags": string[]}`;

export function buildModerationPrompt(content: ModerationContent): string {
	const lines = [
		`Plate number: ${content.plateNumber}`,
		`Violations: ${content.violations.join(', ')}`,
		`Location: ${content.location}`,
		`Description: ${content.description ?? '(none)'}`,
	];
	return `${INSTRUCTIONS}\n\nReport:\n${lines.join('\n')}`;
}
