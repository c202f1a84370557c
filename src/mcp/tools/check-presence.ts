// ============================================================
// MCP Tool: check_presence
// ============================================================

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { toErrorMessage } from '../../shared/errors.js';
import type { HubClient } from '../hub-client.js';

export function registerCheckPresence(server: McpServer, hub: HubClient): void {
    server.tool(
        'check_presence',
        'Check whether users are currently connected to WorkHub',
        {
            user_ids: z.array(z.string()).min(1).max(100).describe('User ids to look up'),
        },
        async ({ user_ids }) => {
            try {
                const presence = await hub.queryPresence(user_ids);
                return {
                    content: [{
                        type: 'text' as const,
                        text: JSON.stringify({ presence }, null, 2),
                    }],
                };
            } catch (err) {
                return {
                    content: [{
                        type: 'text' as const,
                        text: `Error checking presence: ${toErrorMessage(err)}`,
                    }],
                    isError: true,
                };
            }
        }
    );
}
