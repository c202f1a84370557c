// ============================================================
// CLI Entry: workhub-agent
// ============================================================

import 'dotenv/config';
import { startAgent } from '../src/mcp/server.js';
import { issueToken } from '../src/auth/jwt-authenticator.js';
import { toErrorMessage } from '../src/shared/errors.js';
import { createLogger } from '../src/shared/logger.js';

interface AgentArgs {
    hub: string;
    token: string;
    name: string;
    team: string;
    timeout: number;
    verbose: boolean;
}

function parseArgs(): AgentArgs {
    const args = process.argv.slice(2);
    let hub = process.env.WORKHUB_URL ?? 'ws://localhost:3001';
    let token = process.env.AGENT_TOKEN ?? '';
    let name = 'workhub-assistant';
    let team = 'global';
    let timeout = 15000;
    let verbose = false;

    for (let i = 0; i < args.length; i++) {
        switch (args[i]) {
            case '-u':
            case '--hub':
                hub = args[++i] ?? hub;
                break;
            case '--token':
                token = args[++i] ?? '';
                break;
            case '-n':
            case '--name':
                name = args[++i] ?? name;
                break;
            case '--team':
                team = args[++i] ?? team;
                break;
            case '-t':
            case '--timeout':
                timeout = parseInt(args[++i] ?? '', 10);
                if (isNaN(timeout)) {
                    console.error('Error: --timeout requires a number (ms)');
                    process.exit(1);
                }
                break;
            case '-v':
            case '--verbose':
                verbose = true;
                break;
            case '-h':
            case '--help':
                console.error(`
Usage: workhub-agent [options]

Start the AI assistant bridge: an MCP stdio server connected to the hub
as the agent pseudo-user

Options:
  -u, --hub <url>         Hub WebSocket URL (default: $WORKHUB_URL or ws://localhost:3001)
      --token <jwt>       Agent bearer token (default: $AGENT_TOKEN)
  -n, --name <string>     MCP server name (default: "workhub-assistant")
      --team <string>     Team claim when signing a token from $JWT_SECRET (default: "global")
  -t, --timeout <ms>      Reply/presence timeout in ms (default: 15000)
  -v, --verbose           Enable debug logging
  -h, --help              Show help

Without --token, a token is signed with $JWT_SECRET for $AGENT_USER_ID.
`);
                process.exit(0);
        }
    }

    if (!token) {
        const secret = process.env.JWT_SECRET;
        if (!secret) {
            console.error('Error: --token or JWT_SECRET is required');
            process.exit(1);
        }
        token = issueToken(
            { userId: process.env.AGENT_USER_ID ?? 'workhub-agent', role: 'agent', teamId: team },
            secret,
            24 * 3600,
        );
    }

    return { hub, token, name, team, timeout, verbose };
}

const { hub, token, name, timeout, verbose } = parseArgs();

// stdout carries the MCP protocol
const logger = createLogger({ level: verbose ? 'debug' : 'info', stderr: true });

startAgent({ hubUrl: hub, token, name, logger, requestTimeout: timeout }).catch((err: unknown) => {
    logger.error({ error: toErrorMessage(err) }, `Failed to start agent. Make sure the hub is running: workhub-hub --port <port>`);
    process.exit(1);
});
