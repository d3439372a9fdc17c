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

import type {VerifiedIdentity} from '@platewatch/api/src/identity/IIdentityVerifier';
import {InMemoryUserRepository} from '@platewatch/api/src/test/mocks/InMemoryUserRepository';
import {TestClock} from '@platewatch/api/src/test/TestHarness';
import {UserService} from '@platewatch/api/src/user/UserService';
import {InputValidationError} from '@platewatch/errors/src/domains/core/InputValidationError';
import {ms} from 'itty-time';
import {beforeEach, describe, expect, it} from 'vitest';

function identity(overrides: Partial<VerifiedIdentity> = {}): VerifiedIdentity {
	return {
		uid: 'uid-asha',
		email: 'Asha@Example.com ',
		displayName: 'Asha',
		photoUrl: null,
		emailVerified: true,
		...overrides,
	};
}

describe('UserService.register', () => {
	let clock: TestClock;
	let repository: InMemoryUserRepository;
	let service: UserService;

	beforeEach(() => {
		clock = new TestClock();
		repository = new InMemoryUserRepository();
		service = new UserService(repository, {now: clock.now});
	});

	it('creates a user with the initial reputation', async () => {
		const {created, user} = await service.register(identity());

		expect(created).toBe(true);
		expect(user).toMatchObject({
			firebaseUid: 'uid-asha',
			email: 'asha@example.com',
			displayName: 'Asha',
			reputationScore: 100,
			totalReports: 0,
			isBanned: false,
			banReason: null,
		});
		expect(user.createdAt.toISOString()).toBe('2026-03-10T12:00:00.000Z');
	});

	it('refreshes the profile of an existing user', async () => {
		const first = await service.register(identity({photoUrl: 'https://example.com/a.png'}));
		clock.advance(ms('1 hour'));

		const second = await service.register(identity({displayName: 'Asha K', photoUrl: null}));

		expect(second.created).toBe(false);
		expect(second.user.id).toBe(first.user.id);
		expect(second.user.displayName).toBe('Asha K');
		expect(second.user.photoUrl).toBe('https://example.com/a.png');
		expect(second.user.lastLoginAt?.toISOString()).toBe('2026-03-10T13:00:00.000Z');
		expect(second.user.createdAt.toISOString()).toBe('2026-03-10T12:00:00.000Z');
	});

	it('requires an email for a new user', async () => {
		const attempt = service.register(identity({email: null}));

		await expect(attempt).rejects.toBeInstanceOf(InputValidationError);
		await expect(attempt).rejects.toMatchObject({
			errors: [expect.objectContaining({path: 'email', code: 'IDENTITY_EMAIL_MISSING'})],
		});
	});

	it('rejects an email already held by another identity', async () => {
		repository.seed({firebase_uid: 'uid-other', email: 'asha@example.com'});

		await expect(service.register(identity())).rejects.toMatchObject({
			errors: [expect.objectContaining({path: 'email', code: 'EMAIL_ALREADY_REGISTERED'})],
		});
	});
});
