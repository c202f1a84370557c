// ============================================================
// MCP Tool: list_pending_questions
// ============================================================

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PendingQuestions } from '../pending-questions.js';

export function registerListPendingQuestions(server: McpServer, pending: PendingQuestions): void {
    server.tool(
        'list_pending_questions',
        'List worker questions that have not been answered yet, oldest first',
        {},
        async () => {
            const result = {
                questions: pending.list().map(q => ({
                    worker_id: q.workerId,
                    team_id: q.teamId,
                    question: q.content,
                    received_at: q.receivedAt,
                })),
            };

            return {
                content: [{
                    type: 'text' as const,
                    text: JSON.stringify(result, null, 2),
                }],
            };
        }
    );
}
