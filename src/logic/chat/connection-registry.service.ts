import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from './chat-session';

export interface ConnectionStatistics {
    totalConnections: number;
    connectedUsers: number;
    connectionsPerUser: Record<string, number>;
}

export interface RegisteredSession {
    readonly userId: string;
    readonly connectionId: string;
    readonly lastActivityAt: number;
}

/** Live sessions by user. A user may hold several connections at once. */
@Injectable()
export class ConnectionRegistry<S extends RegisteredSession = ChatSession> {
    private readonly logger = new Logger(ConnectionRegistry.name);
    private readonly sessionsByUser = new Map<string, Map<string, S>>();

    register(session: S): void {
        const sessions = this.sessionsByUser.get(session.userId) ?? new Map<string, S>();
        sessions.set(session.connectionId, session);
        this.sessionsByUser.set(session.userId, sessions);
        this.logger.log(`user ${session.userId} connected (${sessions.size} active connections)`);
    }

    unregister(connectionId: string): S | undefined {
        for (const [userId, sessions] of this.sessionsByUser) {
            const session = sessions.get(connectionId);
            if (!session) continue;
            sessions.delete(connectionId);
            if (sessions.size === 0) {
                this.sessionsByUser.delete(userId);
            }
            this.logger.log(`user ${userId} disconnected (${sessions.size} active connections)`);
            return session;
        }
        return undefined;
    }

    find(connectionId: string): S | undefined {
        for (const sessions of this.sessionsByUser.values()) {
            const session = sessions.get(connectionId);
            if (session) return session;
        }
        return undefined;
    }

    sessionsFor(userId: string): S[] {
        return [...(this.sessionsByUser.get(userId)?.values() ?? [])];
    }

    /** Sessions with no activity for longer than `timeoutMs`. */
    idleSessions(now: number, timeoutMs: number): S[] {
        const idle: S[] = [];
        for (const sessions of this.sessionsByUser.values()) {
            for (const session of sessions.values()) {
                if (now - session.lastActivityAt > timeoutMs) idle.push(session);
            }
        }
        return idle;
    }

    statistics(): ConnectionStatistics {
        const connectionsPerUser: Record<string, number> = {};
        let totalConnections = 0;
        for (const [userId, sessions] of this.sessionsByUser) {
            connectionsPerUser[userId] = sessions.size;
            totalConnections += sessions.size;
        }
        return { totalConnections, connectedUsers: this.sessionsByUser.size, connectionsPerUser };
    }
}
