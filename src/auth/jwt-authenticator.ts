// ============================================================
// JWT Authenticator — bearer token → UserIdentity
// ============================================================

import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticationError, toErrorMessage } from '../shared/errors.js';
import type { UserIdentity } from '../shared/types.js';
import type { Authenticator } from '../hub/types.js';

const claimsSchema = z.object({
    sub: z.union([z.string().min(1), z.number().int()]).transform(String),
    role: z.enum(['manager', 'worker', 'agent']),
    team: z.union([z.string().min(1), z.number().int()]).transform(String),
    name: z.string().optional(),
});

/**
 * Verifies HS256 tokens issued by the WorkHub API. Expected claims:
 * `sub` (user id), `role`, `team` and optionally `name`.
 */
export class JwtAuthenticator implements Authenticator {
    private secret: string;

    constructor(secret: string) {
        this.secret = secret;
    }

    async authenticate(token: string): Promise<UserIdentity> {
        let payload: string | JwtPayload;
        try {
            payload = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
        } catch (err) {
            throw new AuthenticationError(`Invalid token: ${toErrorMessage(err)}`, err);
        }

        const claims = claimsSchema.safeParse(payload);
        if (!claims.success) {
            throw new AuthenticationError('Token is missing required claims (sub, role, team)');
        }

        return {
            userId: claims.data.sub,
            role: claims.data.role,
            teamId: claims.data.team,
            displayName: claims.data.name,
        };
    }
}

/**
 * Sign a token the JwtAuthenticator accepts. Used by the agent CLI and tests.
 */
export function issueToken(identity: UserIdentity, secret: string, expiresInSeconds = 3600): string {
    return jwt.sign(
        { role: identity.role, team: identity.teamId, name: identity.displayName },
        secret,
        { algorithm: 'HS256', subject: identity.userId, expiresIn: expiresInSeconds },
    );
}
