import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import jwt from 'jsonwebtoken';
import { JwtAuthenticator, issueToken } from '../src/auth/jwt-authenticator.js';
import { AuthenticationError } from '../src/shared/errors.js';

const SECRET = 'test-secret';

describe('JwtAuthenticator', () => {
    const authenticator = new JwtAuthenticator(SECRET);

    it('accepts tokens it issued', async () => {
        const token = issueToken({ userId: 'w1', role: 'worker', teamId: 't1', displayName: 'Dana' }, SECRET);

        assert.deepEqual(await authenticator.authenticate(token), {
            userId: 'w1',
            role: 'worker',
            teamId: 't1',
            displayName: 'Dana',
        });
    });

    it('turns numeric team claims into strings', async () => {
        const token = jwt.sign({ role: 'manager', team: 7 }, SECRET, { subject: 'm1' });

        const identity = await authenticator.authenticate(token);

        assert.equal(identity.teamId, '7');
        assert.equal(identity.role, 'manager');
    });

    it('rejects tokens signed with another secret', async () => {
        const token = issueToken({ userId: 'w1', role: 'worker', teamId: 't1' }, 'other-secret');

        await assert.rejects(authenticator.authenticate(token), (err: unknown) => {
            assert.ok(err instanceof AuthenticationError);
            assert.equal(err.code, 'UNAUTHORIZED');
            assert.equal(err.message, 'Invalid token: invalid signature');
            return true;
        });
    });

    it('rejects expired tokens', async () => {
        const token = issueToken({ userId: 'w1', role: 'worker', teamId: 't1' }, SECRET, -10);

        await assert.rejects(authenticator.authenticate(token), { message: 'Invalid token: jwt expired' });
    });

    it('rejects tokens without the identity claims', async () => {
        const token = jwt.sign({ role: 'visitor', team: 't1' }, SECRET, { subject: 'v1' });

        await assert.rejects(authenticator.authenticate(token), {
            name: 'AuthenticationError',
            message: 'Token is missing required claims (sub, role, team)',
        });
    });

    it('rejects garbage', async () => {
        await assert.rejects(authenticator.authenticate('not-a-token'), AuthenticationError);
    });
});
