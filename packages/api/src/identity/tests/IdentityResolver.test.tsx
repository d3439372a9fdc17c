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

import {extractBearerToken, IdentityResolver} from '@platewatch/api/src/identity/IdentityResolver';
import {InMemoryUserRepository} from '@platewatch/api/src/test/mocks/InMemoryUserRepository';
import {MockIdentityVerifier} from '@platewatch/api/src/test/mocks/MockIdentityVerifier';
import {beforeEach, describe, expect, it, vi} from 'vitest';

describe('extractBearerToken', () => {
	it('reads the token of a bearer header', () => {
		expect(extractBearerToken('Bearer token-1')).toBe('token-1');
		expect(extractBearerToken('bearer   token-1  ')).toBe('token-1');
	});

	it('returns null for anything else', () => {
		expect(extractBearerToken(undefined)).toBeNull();
		expect(extractBearerToken('')).toBeNull();
		expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
		expect(extractBearerToken('Bearer')).toBeNull();
		expect(extractBearerToken('Bearer a b')).toBeNull();
	});
});

describe('IdentityResolver', () => {
	let verifier: MockIdentityVerifier;
	let users: InMemoryUserRepository;
	let resolver: IdentityResolver;

	beforeEach(() => {
		verifier = new MockIdentityVerifier();
		users = new InMemoryUserRepository();
		resolver = new IdentityResolver(verifier, users);
	});

	it('resolves a missing header to the anonymous actor', async () => {
		expect(await resolver.resolve({authorization: null, clientIp: '1.2.3.4'})).toEqual({
			kind: 'anonymous',
			ip: '1.2.3.4',
		});
		expect(verifier.verify).not.toHaveBeenCalled();
	});

	it('resolves a malformed header without calling the verifier', async () => {
		const result = await resolver.resolveRequest({authorization: 'Token abc', clientIp: '1.2.3.4'});

		expect(result).toEqual({actor: {kind: 'anonymous', ip: '1.2.3.4'}, identity: null});
		expect(verifier.verify).not.toHaveBeenCalled();
	});

	it('resolves an invalid token to the anonymous actor', async () => {
		const result = await resolver.resolveRequest({authorization: 'Bearer unknown', clientIp: '1.2.3.4'});

		expect(result.actor).toEqual({kind: 'anonymous', ip: '1.2.3.4'});
		expect(verifier.verify).toHaveBeenCalledWith('unknown');
	});

	it('treats a verifier failure as no identity', async () => {
		verifier.register('token-1', {uid: 'uid-1'});
		verifier.failWith(new Error('certificate fetch failed'));

		const result = await resolver.resolveRequest({authorization: 'Bearer token-1', clientIp: '1.2.3.4'});

		expect(result).toEqual({actor: {kind: 'anonymous', ip: '1.2.3.4'}, identity: null});
	});

	it('resolves a registered user', async () => {
		const user = users.seed({firebase_uid: 'uid-1', email: 'uid-1@example.com'});
		verifier.register('token-1', {uid: 'uid-1'});

		const actor = await resolver.resolve({authorization: 'Bearer token-1', clientIp: '1.2.3.4'});

		expect(actor.kind).toBe('user');
		expect(actor.kind === 'user' ? actor.user.id : null).toBe(user.id);
	});

	it('returns the identity of an unregistered user alongside the anonymous actor', async () => {
		const registered = verifier.register('token-2', {uid: 'uid-2', displayName: 'Ravi'});

		const result = await resolver.resolveRequest({authorization: 'Bearer token-2', clientIp: '1.2.3.4'});

		expect(result.actor).toEqual({kind: 'anonymous', ip: '1.2.3.4'});
		expect(result.identity).toEqual(registered);
	});

	it('falls back to the anonymous actor when the user lookup fails', async () => {
		users.seed({firebase_uid: 'uid-1', email: 'uid-1@example.com'});
		verifier.register('token-1', {uid: 'uid-1'});
		vi.spyOn(users, 'findByFirebaseUid').mockRejectedValueOnce(new Error('read timeout'));

		const result = await resolver.resolveRequest({authorization: 'Bearer token-1', clientIp: '1.2.3.4'});

		expect(result).toEqual({actor: {kind: 'anonymous', ip: '1.2.3.4'}, identity: null});
	});
});
