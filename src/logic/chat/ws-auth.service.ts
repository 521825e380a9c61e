import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { errorMessage } from '../../utils/errors';

export interface HandshakeCredentials {
    auth?: Record<string, unknown>;
    query?: Record<string, unknown>;
}

export function parseString(value: unknown): string | undefined {
    if (Array.isArray(value)) {
        return parseString(value[0]);
    }
    if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
    }
    return undefined;
}

/** Resolves the user id of a socket handshake from its JWT; `sub` is the user id. */
@Injectable()
export class WsAuthService {
    private readonly logger = new Logger(WsAuthService.name);

    constructor(private readonly jwtService: JwtService) { }

    async authenticate(handshake: HandshakeCredentials): Promise<string | null> {
        const token = parseString(handshake.auth?.token) ?? parseString(handshake.query?.token);
        if (!token) {
            return null;
        }
        try {
            const payload = await this.jwtService.verifyAsync<{ sub?: unknown }>(token);
            const userId = typeof payload.sub === 'number' ? String(payload.sub) : parseString(payload.sub);
            return userId ?? null;
        } catch (error) {
            this.logger.warn(`rejected socket token: ${errorMessage(error)}`);
            return null;
        }
    }
}
