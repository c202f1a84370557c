// ============================================================
// Integration Test — hub over real sockets with HubClient peers
// ============================================================

import { describe, it, before, after, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { extractToken, startHub } from '../src/hub/server.js';
import type { HubServer } from '../src/hub/server.js';
import { JwtAuthenticator, issueToken } from '../src/auth/jwt-authenticator.js';
import { HubClient } from '../src/mcp/hub-client.js';
import { InMemoryMessageStore } from '../src/store/memory-store.js';
import { HubError } from '../src/shared/errors.js';
import { createNullLogger } from '../src/shared/logger.js';
import type { HistorySyncMessage, MessageView, UserIdentity } from '../src/shared/types.js';
import { agent, manager1, worker1, worker2 } from './helpers/fakes.js';

const SECRET = 'test-secret';

function nextMessage(c: HubClient): Promise<MessageView> {
    return new Promise(resolve => c.once('message', resolve));
}

function nextQuestion(c: HubClient): Promise<MessageView> {
    return new Promise(resolve => c.once('question', resolve));
}

function nextHistory(c: HubClient): Promise<HistorySyncMessage> {
    return new Promise(resolve => c.once('history', resolve));
}

function nextDisconnect(c: HubClient): Promise<number> {
    return new Promise(resolve => c.once('disconnected', resolve));
}

describe('hub over WebSocket', () => {
    let server: HubServer;
    let url: string;
    let clients: HubClient[] = [];

    function client(identity: UserIdentity, token = issueToken(identity, SECRET)): HubClient {
        const c = new HubClient(url, token, { requestTimeout: 2000 });
        clients.push(c);
        return c;
    }

    async function connected(identity: UserIdentity): Promise<{ c: HubClient; history: HistorySyncMessage }> {
        const c = client(identity);
        const historyEvent = nextHistory(c);
        await c.connect();
        const history = await historyEvent;
        return { c, history };
    }

    before(async () => {
        server = startHub({
            port: 0,
            host: '127.0.0.1',
            authenticator: new JwtAuthenticator(SECRET),
            store: new InMemoryMessageStore(),
            logger: createNullLogger(),
            heartbeatIntervalMs: 0,
        });
        const port = await server.listening();
        url = `ws://127.0.0.1:${port}`;
    });

    afterEach(async () => {
        await Promise.all(clients.map(c => c.close()));
        clients = [];
    });

    after(async () => {
        await server.close();
    });

    it('refuses connections without a valid token', async () => {
        await assert.rejects(client(worker1, 'not-a-token').connect(), (err: unknown) => {
            assert.ok(err instanceof HubError);
            assert.equal(err.message, 'Hub refused connection: HTTP 401');
            return true;
        });
        await assert.rejects(client(worker1, issueToken(worker1, 'other-secret')).connect(), HubError);
    });

    it('delivers chat between workers and acks the sender', async () => {
        const { c: alice } = await connected(worker1);
        const { c: bob } = await connected(worker2);
        const received = nextMessage(bob);

        const ack = await alice.sendChat('w2', 'lunch at noon?');
        const message = await received;

        assert.equal(message.content, 'lunch at noon?');
        assert.equal(message.senderId, 'w1');
        assert.equal(message.messageId, ack.messageId);
        assert.deepEqual(ack.delivered, ['w2']);
    });

    it('replays stored messages on reconnect', async () => {
        const { c: alice } = await connected(worker1);
        const { c: bob } = await connected(worker2);
        await alice.sendChat('w2', 'see you tomorrow');
        await bob.close();

        const { history } = await connected(worker2);

        assert.equal(history.historyAvailable, true);
        assert.equal(history.messages.at(-1)?.content, 'see you tomorrow');
        assert.equal(typeof history.messages.at(-1)?.recordId, 'number');
    });

    it('bridges questions to the agent and answers back to worker and manager', async () => {
        const { c: bot } = await connected(agent);
        const { c: worker } = await connected(worker1);
        const { c: manager } = await connected(manager1);

        const asked = nextQuestion(bot);
        await worker.askAgent('how do I reset the scanner?');
        const question = await asked;
        assert.equal(question.senderId, 'w1');
        assert.equal(question.teamId, 't1');

        const workerGot = nextMessage(worker);
        const managerGot = nextMessage(manager);
        const ack = await bot.respond(question.senderId, question.teamId, 'hold the power button');
        const toWorker = await workerGot;
        const toManager = await managerGot;

        assert.deepEqual(ack.delivered, ['w1', 'm1']);
        assert.equal(toWorker.kind, 'agent_response');
        assert.equal(toManager.content, 'hold the power button');
    });

    it('answers presence queries', async () => {
        const { c: manager } = await connected(manager1);
        await connected(worker1);

        const presence = await manager.queryPresence(['w1', 'w2']);

        assert.deepEqual(presence.map(p => `${p.userId}:${p.status}`), ['w1:online', 'w2:offline']);
    });

    it('closes the older connection when a user connects twice', async () => {
        const { c: first } = await connected(worker1);
        const closed = nextDisconnect(first);

        await connected(worker1);
        const code = await closed;

        assert.equal(code, 4000);
    });

    it('rejects requests the hub refuses', async () => {
        const { c: worker } = await connected(worker1);

        await assert.rejects(worker.respond('w2', 't1', 'pretending'), (err: unknown) => {
            assert.ok(err instanceof HubError);
            assert.equal(err.code, 'FORBIDDEN');
            assert.equal(err.message, 'Only the agent service can send agent responses');
            return true;
        });
    });

    it('keeps agent answers inside the worker\'s team', async () => {
        const { c: bot } = await connected(agent);
        await connected(worker1);

        await assert.rejects(bot.respond('w1', 't2', 'wrong team'), (err: unknown) => {
            assert.ok(err instanceof HubError);
            assert.equal(err.code, 'CROSS_TEAM');
            return true;
        });
    });
});

describe('extractToken', () => {
    function request(url: string, authorization?: string): IncomingMessage {
        const req = new IncomingMessage(new Socket());
        req.url = url;
        if (authorization) req.headers.authorization = authorization;
        return req;
    }

    it('prefers the bearer header', () => {
        assert.equal(extractToken(request('/?token=from-query', 'Bearer from-header')), 'from-header');
    });

    it('falls back to the token query parameter', () => {
        assert.equal(extractToken(request('/ws?token=from-query', 'Basic abc')), 'from-query');
    });

    it('returns undefined without a token', () => {
        assert.equal(extractToken(request('/')), undefined);
    });
});
