// ============================================================
// MCP Tool: reply_to_worker — answer a worker's question
// ============================================================

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { toErrorMessage } from '../../shared/errors.js';
import type { HubClient } from '../hub-client.js';
import type { PendingQuestions } from '../pending-questions.js';

export function registerReplyToWorker(server: McpServer, hub: HubClient, pending: PendingQuestions): void {
    server.tool(
        'reply_to_worker',
        'Send an answer to a worker who asked the assistant a question. The worker\'s managers get a copy unless notify_managers is false.',
        {
            worker_id: z.string().describe('User id of the worker to answer'),
            message: z.string().min(1).describe('Your answer'),
            team_id: z.string().optional().describe('Team of the worker; only needed when there is no pending question from them'),
            notify_managers: z.boolean().optional().describe('Also deliver the answer to the team\'s managers (default true)'),
        },
        async ({ worker_id, message, team_id, notify_managers }) => {
            const teamId = team_id ?? pending.forWorker(worker_id)?.teamId;
            if (!teamId) {
                return {
                    content: [{
                        type: 'text' as const,
                        text: `No pending question from "${worker_id}"; pass team_id to reply anyway.`,
                    }],
                    isError: true,
                };
            }

            try {
                const ack = await hub.respond(worker_id, teamId, message, notify_managers ?? true);
                pending.resolve(worker_id);
                return {
                    content: [{
                        type: 'text' as const,
                        text: JSON.stringify({
                            status: 'sent',
                            to: worker_id,
                            messageId: ack.messageId,
                            delivered: ack.delivered,
                        }),
                    }],
                };
            } catch (err) {
                return {
                    content: [{
                        type: 'text' as const,
                        text: `Error sending reply: ${toErrorMessage(err)}`,
                    }],
                    isError: true,
                };
            }
        },
    );
}
