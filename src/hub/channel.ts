// ============================================================
// WsChannel — Channel over a ws WebSocket
// ============================================================

import { randomUUID } from 'crypto';
import { WebSocket } from 'ws';
import { ChannelClosedError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { ServerFrame } from '../shared/types.js';
import type { Channel } from './types.js';

export class WsChannel implements Channel {
    readonly id: string;
    private ws: WebSocket;
    private logger: Logger;

    constructor(ws: WebSocket, logger: Logger, id: string = randomUUID()) {
        this.ws = ws;
        this.id = id;
        this.logger = logger;
    }

    isOpen(): boolean {
        return this.ws.readyState === WebSocket.OPEN;
    }

    /**
     * Frames are queued by ws in call order. A write that fails later
     * terminates the socket; its close handler unregisters the user.
     */
    send(frame: ServerFrame): void {
        if (!this.isOpen()) {
            throw new ChannelClosedError(this.id);
        }
        this.ws.send(JSON.stringify(frame), (err) => {
            if (err) {
                this.logger.warn({ channelId: this.id, error: err.message }, 'Write failed, terminating socket');
                this.ws.terminate();
            }
        });
    }

    close(code?: number, reason?: string): void {
        if (this.ws.readyState === WebSocket.CLOSED || this.ws.readyState === WebSocket.CLOSING) return;
        this.ws.close(code, reason);
    }
}
