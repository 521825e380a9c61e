import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RateLimitViolation } from '../../entities';
import { LimitKind, Violation } from './types';

const MAX_STORED_MESSAGE = 500;

@Injectable()
export class ViolationsService {
    private readonly logger = new Logger(ViolationsService.name);

    constructor(
        @InjectRepository(RateLimitViolation)
        private readonly violationRepository: Repository<RateLimitViolation>,
    ) { }

    /** Append-only; a violation is never updated after it is written. */
    async record(violation: Violation): Promise<void> {
        await this.violationRepository.insert({
            userId: violation.userId,
            conversationId: violation.conversationId ?? null,
            kind: violation.kind,
            limitValue: violation.limit,
            used: violation.used,
            actionTaken: 'blocked',
            userMessage: violation.userMessage?.slice(0, MAX_STORED_MESSAGE) ?? null,
            clientAddress: violation.clientAddress ?? null,
            userAgent: violation.userAgent ?? null,
            violatedAt: violation.timestamp,
        });
        this.logger.debug(`violation ${violation.kind} recorded for user ${violation.userId}`);
    }

    async list(options: { limit?: number; offset?: number; kind?: LimitKind; userId?: string } = {}): Promise<Violation[]> {
        const rows = await this.violationRepository.find({
            where: {
                ...(options.kind ? { kind: options.kind } : {}),
                ...(options.userId ? { userId: options.userId } : {}),
            },
            order: { violatedAt: 'DESC' },
            take: options.limit ?? 100,
            skip: options.offset ?? 0,
        });
        return rows.map((row) => ({
            userId: row.userId,
            conversationId: row.conversationId ?? undefined,
            kind: row.kind,
            limit: row.limitValue,
            used: row.used,
            timestamp: row.violatedAt,
            userMessage: row.userMessage ?? undefined,
            clientAddress: row.clientAddress ?? undefined,
            userAgent: row.userAgent ?? undefined,
        }));
    }
}
