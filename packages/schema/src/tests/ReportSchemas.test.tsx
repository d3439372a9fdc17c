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

import {ModerationVerdict} from '@platewatch/schema/src/domains/moderation/ModerationSchemas';
import {ReportCreateRequest, ReportListQuery} from '@platewatch/schema/src/domains/report/ReportSchemas';
import {describe, expect, it} from 'vitest';

function issueMessages(input: unknown): Array<string> {
	const result = ReportCreateRequest.safeParse(input);
	return result.success ? [] : result.error.issues.map((issue) => `${issue.path.join('.')}:${issue.message}`);
}

describe('ReportCreateRequest', () => {
	it('normalizes plate numbers and violation categories', () => {
		const parsed = ReportCreateRequest.parse({
			plate_number: ' kl 07 ab\t1234 ',
			violations: [' No_Helmet ', 'no_helmet', 'RED_LIGHT'],
			location: '  MG Road, Kochi ',
		});

		expect(parsed).toEqual({
			plate_number: 'KL07AB1234',
			violations: ['no_helmet', 'red_light'],
			location: 'MG Road, Kochi',
			description: null,
			photo_url: null,
		});
	});

	it('keeps optional description and photo when present', () => {
		const parsed = ReportCreateRequest.parse({
			plate_number: 'KL07AB1234',
			violations: ['wrong_side'],
			location: 'Edappally junction',
			description: ' Drove against traffic ',
			photo_url: 'https://photos.example.test/abc.jpg',
		});

		expect(parsed.description).toBe('Drove against traffic');
		expect(parsed.photo_url).toBe('https://photos.example.test/abc.jpg');
	});

	it('rejects a missing plate number', () => {
		expect(issueMessages({violations: ['no_helmet'], location: 'Kochi'})).toEqual([
			'plate_number:PLATE_NUMBER_REQUIRED',
		]);
	});

	it('rejects a plate number that is only whitespace', () => {
		expect(issueMessages({plate_number: '   ', violations: ['no_helmet'], location: 'Kochi'})).toContain(
			'plate_number:PLATE_NUMBER_REQUIRED',
		);
	});

	it('rejects plate numbers with symbols', () => {
		expect(issueMessages({plate_number: 'KL@07', violations: ['no_helmet'], location: 'Kochi'})).toEqual([
			'plate_number:PLATE_NUMBER_INVALID',
		]);
	});

	it('rejects an empty violation list', () => {
		expect(issueMessages({plate_number: 'KL07AB1234', violations: [], location: 'Kochi'})).toEqual([
			'violations:VIOLATIONS_REQUIRED',
		]);
	});

	it('rejects blank violation entries', () => {
		expect(issueMessages({plate_number: 'KL07AB1234', violations: ['speeding', '   '], location: 'Kochi'})).toEqual([
			'violations.1:VIOLATION_BLANK',
		]);
	});

	it('rejects a missing location', () => {
		expect(issueMessages({plate_number: 'KL07AB1234', violations: ['speeding']})).toEqual([
			'location:LOCATION_REQUIRED',
		]);
	});

	it('rejects photo URLs that are not http(s)', () => {
		expect(
			issueMessages({
				plate_number: 'KL07AB1234',
				violations: ['speeding'],
				location: 'Kochi',
				photo_url: 'ftp://files.example.test/a.jpg',
			}),
		).toEqual(['photo_url:PHOTO_URL_INVALID']);
	});
});

describe('ReportListQuery', () => {
	it('applies defaults', () => {
		expect(ReportListQuery.parse({})).toEqual({limit: 10, offset: 0});
	});

	it('coerces query strings', () => {
		expect(ReportListQuery.parse({limit: '25', offset: '5'})).toEqual({limit: 25, offset: 5});
	});

	it('bounds the page size', () => {
		expect(ReportListQuery.safeParse({limit: '101'}).success).toBe(false);
		expect(ReportListQuery.safeParse({limit: '0'}).success).toBe(false);
		expect(ReportListQuery.safeParse({offset: '-1'}).success).toBe(false);
	});
});

describe('ModerationVerdict', () => {
	const valid = {approved: true, reason: 'Clear violation description', confidence: 0.9, flags: []};

	it('accepts a well-formed verdict', () => {
		expect(ModerationVerdict.parse(valid)).toEqual(valid);
	});

	it('rejects extra keys', () => {
		expect(ModerationVerdict.safeParse({...valid, severity: 'high'}).success).toBe(false);
	});

	it('rejects confidence outside [0, 1]', () => {
		expect(ModerationVerdict.safeParse({...valid, confidence: 1.2}).success).toBe(false);
	});

	it('rejects a string where a boolean is expected', () => {
		expect(ModerationVerdict.safeParse({...valid, approved: 'true'}).success).toBe(false);
	});
});
