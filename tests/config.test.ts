import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../src/shared/config.js';
import { ConfigError } from '../src/shared/errors.js';

describe('loadConfig', () => {
    it('fills defaults around the required secret', () => {
        assert.deepEqual(loadConfig({ JWT_SECRET: 'test-secret' }), {
            port: 3001,
            host: '0.0.0.0',
            jwtSecret: 'test-secret',
            agentUserId: 'workhub-agent',
            systemSenderId: 'system',
            historyLimit: 200,
            historyBufferLimit: 500,
            heartbeatIntervalMs: 30000,
            stateFile: undefined,
            logLevel: 'info',
            logPretty: true,
        });
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            JWT_SECRET: 'test-secret',
            PORT: '8080',
            HISTORY_LIMIT: '50',
            HEARTBEAT_INTERVAL_MS: '0',
            STATE_FILE: './data/messages.json',
            LOG_LEVEL: 'debug',
            LOG_PRETTY: 'false',
        });

        assert.equal(config.port, 8080);
        assert.equal(config.historyLimit, 50);
        assert.equal(config.heartbeatIntervalMs, 0);
        assert.equal(config.stateFile, './data/messages.json');
        assert.equal(config.logLevel, 'debug');
        assert.equal(config.logPretty, false);
    });

    it('turns pretty logs off in production', () => {
        assert.equal(loadConfig({ JWT_SECRET: 'test-secret', NODE_ENV: 'production' }).logPretty, false);
    });

    it('requires JWT_SECRET', () => {
        assert.throws(() => loadConfig({}), {
            name: 'ConfigError',
            message: 'Invalid configuration: JWT_SECRET: JWT_SECRET is required',
        });
    });

    it('lists every invalid key', () => {
        assert.throws(() => loadConfig({ JWT_SECRET: 'short', PORT: '70000' }), (err: unknown) => {
            assert.ok(err instanceof ConfigError);
            assert.equal(err.code, 'CONFIG_INVALID');
            assert.match(err.message, /PORT: /);
            assert.match(err.message, /JWT_SECRET: JWT_SECRET must be at least 8 characters/);
            return true;
        });
    });
});
