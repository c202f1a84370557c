import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MAX_CONTENT_LENGTH, parseClientFrame } from '../src/shared/schemas.js';

describe('parseClientFrame', () => {
    it('accepts a chat frame and trims its content', () => {
        assert.deepEqual(parseClientFrame(JSON.stringify({ type: 'chat:send', to: 'w2', content: ' hi ' })), {
            ok: true,
            frame: { type: 'chat:send', to: 'w2', content: 'hi' },
        });
    });

    it('accepts an agent response with its routing fields', () => {
        const result = parseClientFrame(JSON.stringify({
            type: 'agent:respond',
            workerId: 'w1',
            teamId: 't1',
            content: 'done',
            notifyManagers: false,
        }));

        assert.equal(result.ok, true);
        assert.deepEqual(result.ok && result.frame, {
            type: 'agent:respond',
            workerId: 'w1',
            teamId: 't1',
            content: 'done',
            notifyManagers: false,
        });
    });

    it('rejects content over the size limit', () => {
        const result = parseClientFrame(JSON.stringify({
            type: 'agent:ask',
            content: 'x'.repeat(MAX_CONTENT_LENGTH + 1),
        }));

        assert.equal(result.ok, false);
        assert.match(result.ok ? '' : result.error, /^content: /);
    });

    it('names the missing field', () => {
        assert.deepEqual(parseClientFrame(JSON.stringify({ type: 'chat:send', content: 'hi' })), {
            ok: false,
            error: 'to: Required',
        });
    });

    it('rejects non-JSON input', () => {
        assert.deepEqual(parseClientFrame('ping'), { ok: false, error: 'Invalid JSON' });
    });
});
