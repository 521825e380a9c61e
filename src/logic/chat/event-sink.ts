import { TransportError } from '../../utils/errors';
import { CHAT_EVENT, ChatEvent, toWire } from './events';

/** Where a session writes its events. `send` throws TransportError once the peer is gone. */
export interface EventSink {
    readonly isOpen: boolean;
    send(event: ChatEvent): void;
    close(): void;
}

/** The part of a socket.io socket the sink needs. */
export interface SocketLike {
    readonly connected: boolean;
    emit(event: string, ...args: unknown[]): boolean;
    disconnect(close?: boolean): unknown;
}

export class SocketEventSink implements EventSink {
    constructor(private readonly socket: SocketLike) { }

    get isOpen(): boolean {
        return this.socket.connected;
    }

    send(event: ChatEvent): void {
        if (!this.socket.connected) {
            throw new TransportError();
        }
        this.socket.emit(CHAT_EVENT, toWire(event));
    }

    close(): void {
        if (this.socket.connected) {
            this.socket.disconnect(true);
        }
    }
}
