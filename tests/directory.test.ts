import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TeamDirectory } from '../src/hub/directory.js';
import { ConnectionRegistry } from '../src/hub/registry.js';
import { createNullLogger } from '../src/shared/logger.js';
import { FakeChannel, outsider, worker1 } from './helpers/fakes.js';

describe('TeamDirectory', () => {
    it('answers from seeded identities, then the fallback', () => {
        const directory = new TeamDirectory([worker1], { teamOf: id => (id === 'x7' ? 't7' : undefined) });

        assert.equal(directory.teamOf('w1'), 't1');
        assert.equal(directory.teamOf('x7'), 't7');
        assert.equal(directory.teamOf('nobody'), undefined);
    });

    it('keeps the team of users after they disconnect', () => {
        const registry = new ConnectionRegistry(createNullLogger());
        const directory = new TeamDirectory();
        directory.follow(registry);
        const channel = new FakeChannel('c1');

        registry.register(outsider, channel);
        registry.unregister('x1', channel);

        assert.equal(directory.teamOf('x1'), 't2');
    });

    it('stops learning once unsubscribed', () => {
        const registry = new ConnectionRegistry(createNullLogger());
        const directory = new TeamDirectory();
        directory.follow(registry)();

        registry.register(worker1, new FakeChannel('c1'));

        assert.equal(directory.teamOf('w1'), undefined);
    });
});
