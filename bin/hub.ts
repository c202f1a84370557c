// ============================================================
// CLI Entry: workhub-hub
// ============================================================

import 'dotenv/config';
import { startHub } from '../src/hub/server.js';
import { JwtAuthenticator } from '../src/auth/jwt-authenticator.js';
import { InMemoryMessageStore } from '../src/store/memory-store.js';
import { loadConfig } from '../src/shared/config.js';
import type { HubConfig } from '../src/shared/config.js';
import { toErrorMessage } from '../src/shared/errors.js';
import { createLogger } from '../src/shared/logger.js';

function parseArgs(): { port?: number; verbose: boolean } {
    const args = process.argv.slice(2);
    let port: number | undefined;
    let verbose = false;

    for (let i = 0; i < args.length; i++) {
        switch (args[i]) {
            case '-p':
            case '--port':
                port = parseInt(args[++i] ?? '', 10);
                if (isNaN(port)) {
                    console.error('Error: --port requires a number');
                    process.exit(1);
                }
                break;
            case '-v':
            case '--verbose':
                verbose = true;
                break;
            case '-h':
            case '--help':
                console.log(`
Usage: workhub-hub [options]

Start the WorkHub realtime messaging hub

Options:
  -p, --port <number>    Port number (default: $PORT or 3001)
  -v, --verbose          Enable debug logging
  -h, --help             Show help

Environment:
  JWT_SECRET             Secret used to verify bearer tokens (required)
  STATE_FILE             Persist message history to this JSON file
  LOG_LEVEL, LOG_PRETTY  Logging output
`);
                process.exit(0);
        }
    }

    return { port, verbose };
}

const { port, verbose } = parseArgs();

function readConfig(): HubConfig {
    try {
        return loadConfig();
    } catch (err) {
        console.error(`Error: ${toErrorMessage(err)}`);
        process.exit(1);
    }
}

const config = readConfig();

const logger = createLogger({ level: verbose ? 'debug' : config.logLevel, pretty: config.logPretty });

const store = new InMemoryMessageStore({
    historyLimit: config.historyLimit,
    stateFile: config.stateFile,
    logger,
});

const server = startHub({
    port: port ?? config.port,
    host: config.host,
    authenticator: new JwtAuthenticator(config.jwtSecret),
    store,
    directory: store,
    logger,
    agentUserId: config.agentUserId,
    systemSenderId: config.systemSenderId,
    historyBufferLimit: config.historyBufferLimit,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
});

// Graceful shutdown
function shutdown(signal: string): void {
    logger.info({ signal }, 'Shutting down');
    server.close().then(
        () => process.exit(0),
        (err: unknown) => {
            logger.error({ error: toErrorMessage(err) }, 'Shutdown failed');
            process.exit(1);
        },
    );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
