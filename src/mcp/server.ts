// ============================================================
// MCP Server — AI assistant bridge (stdio transport)
// ============================================================

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { toErrorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { MessageView } from '../shared/types.js';
import { HubClient } from './hub-client.js';
import { PendingQuestions } from './pending-questions.js';
import type { PendingQuestion } from './pending-questions.js';
import { registerReplyToWorker } from './tools/reply-to-worker.js';
import { registerCheckPresence } from './tools/check-presence.js';
import { registerListPendingQuestions } from './tools/list-pending-questions.js';

export interface AgentOptions {
    hubUrl: string;
    /** Bearer token with role `agent` */
    token: string;
    name?: string;
    logger: Logger;
    requestTimeout?: number;
}

export interface AgentHandle {
    server: McpServer;
    hub: HubClient;
    pending: PendingQuestions;
    close(): Promise<void>;
}

/**
 * Text of a sampling result. Older hosts return a single content block,
 * newer ones may return a list.
 */
export function samplingText(content: unknown): string | undefined {
    const blocks: unknown[] = Array.isArray(content) ? content : [content];
    const texts: string[] = [];
    for (const block of blocks) {
        if (typeof block === 'object' && block !== null && 'type' in block && block.type === 'text'
            && 'text' in block && typeof block.text === 'string') {
            texts.push(block.text);
        }
    }
    const text = texts.join('\n').trim();
    return text || undefined;
}

export function buildQuestionPrompt(question: PendingQuestion): string {
    return `[Question from worker ${question.workerId} (team ${question.teamId})]\n${question.content}\n\nPlease answer this worker's question.`;
}

export async function startAgent(options: AgentOptions): Promise<AgentHandle> {
    const { hubUrl, token, name = 'workhub-assistant', requestTimeout } = options;
    const log = options.logger.child({ component: 'agent' });

    const server = new McpServer({
        name,
        version: '0.1.0',
    });

    const hub = new HubClient(hubUrl, token, {
        requestTimeout,
        autoReconnect: true,
        logger: options.logger,
    });
    const pending = new PendingQuestions();

    registerReplyToWorker(server, hub, pending);
    registerCheckPresence(server, hub);
    registerListPendingQuestions(server, pending);

    async function answer(question: PendingQuestion): Promise<void> {
        if (!server.server.getClientCapabilities()?.sampling) {
            log.info({ workerId: question.workerId }, 'Host does not support sampling, question kept pending');
            return;
        }

        const result = await server.server.createMessage({
            messages: [
                {
                    role: 'user',
                    content: { type: 'text', text: buildQuestionPrompt(question) },
                },
            ],
            maxTokens: 4096,
        });

        const text = samplingText(result.content);
        if (!text) {
            log.warn({ workerId: question.workerId }, 'Sampling returned no text, question kept pending');
            return;
        }

        await hub.respond(question.workerId, question.teamId, text);
        pending.resolve(question.workerId);
        log.info({ workerId: question.workerId }, 'Answered worker question');
    }

    hub.on('question', (message: MessageView) => {
        const question = pending.add(message);
        log.debug({ workerId: question.workerId, messageId: question.messageId }, 'Question received');
        answer(question).catch((err: unknown) => {
            log.warn({ workerId: question.workerId, error: toErrorMessage(err) }, 'Automatic answer failed, question kept pending');
        });
    });

    hub.on('history', (sync) => {
        log.info({ messages: sync.messages.length, historyAvailable: sync.historyAvailable }, 'History synced');
    });

    try {
        await hub.connect();
    } catch (err) {
        log.error({ hubUrl, error: toErrorMessage(err) }, 'Failed to connect to hub');
        throw err;
    }

    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.info({ name }, 'MCP server connected and ready');

    return {
        server,
        hub,
        pending,
        async close() {
            await hub.close();
            await server.close();
        },
    };
}
