import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { z } from 'zod';
import { Environment } from '../../config/configuration';
import { RateLimitConfig } from '../../entities';
import { LimitKind, RateLimitPolicy, Violation, WindowLimitOverrides, WindowLimits } from './types';
import { ViolationsService } from './violations.service';
import { WINDOW_COUNTER_STORE, WindowCounterStore } from './window-counter.store';

const limitValue = z.number().int().nonnegative();

export const limitOverridesSchema = z
    .object({
        burst: limitValue,
        perConversation: limitValue,
        hourly: limitValue,
        daily: limitValue,
    })
    .partial()
    .strict();

/**
 * Source of the thresholds the admission check runs against. The newest
 * `rate_limit_config` row wins; without one the environment defaults apply.
 */
@Injectable()
export class RateLimitPolicyService {
    private readonly logger = new Logger(RateLimitPolicyService.name);

    constructor(
        @InjectRepository(RateLimitConfig)
        private readonly configRepository: Repository<RateLimitConfig>,
        private readonly configService: ConfigService<Environment, true>,
        @Inject(WINDOW_COUNTER_STORE)
        private readonly counters: WindowCounterStore,
        private readonly violationsService: ViolationsService,
    ) { }

    async snapshot(): Promise<RateLimitPolicy> {
        const row = await this.latest();
        if (!row) {
            return { defaults: this.environmentDefaults(), overrides: {}, whitelist: new Set<string>() };
        }
        return {
            defaults: {
                burst: row.burstLimitPerMinute,
                perConversation: row.perConversationLimit,
                hourly: row.perHourLimit,
                daily: row.perDayLimit,
            },
            overrides: { ...(row.userOverrides ?? {}) },
            whitelist: new Set(row.whitelistedUsers ?? []),
        };
    }

    async updateGlobalLimits(updates: WindowLimitOverrides, adminId: string): Promise<RateLimitPolicy> {
        const limits = limitOverridesSchema.parse(updates);
        const row = await this.ensureRow();
        if (limits.burst !== undefined) row.burstLimitPerMinute = limits.burst;
        if (limits.perConversation !== undefined) row.perConversationLimit = limits.perConversation;
        if (limits.hourly !== undefined) row.perHourLimit = limits.hourly;
        if (limits.daily !== undefined) row.perDayLimit = limits.daily;
        row.updatedBy = adminId;
        await this.configRepository.save(row);
        this.logger.log(`global rate limits updated by ${adminId}`);
        return this.snapshot();
    }

    async setUserLimits(userId: string, limits: WindowLimitOverrides, adminId: string): Promise<void> {
        const parsed = limitOverridesSchema.parse(limits);
        const row = await this.ensureRow();
        row.userOverrides = { ...(row.userOverrides ?? {}), [userId]: parsed };
        row.updatedBy = adminId;
        await this.configRepository.save(row);
    }

    async whitelistUser(userId: string, adminId: string): Promise<void> {
        const row = await this.ensureRow();
        const current = row.whitelistedUsers ?? [];
        if (current.includes(userId)) {
            return;
        }
        row.whitelistedUsers = [...current, userId];
        row.updatedBy = adminId;
        await this.configRepository.save(row);
    }

    async removeWhitelist(userId: string, adminId: string): Promise<void> {
        const row = await this.ensureRow();
        row.whitelistedUsers = (row.whitelistedUsers ?? []).filter((id) => id !== userId);
        row.updatedBy = adminId;
        await this.configRepository.save(row);
    }

    async resetUserCounters(userId: string, now = new Date()): Promise<void> {
        await this.counters.reset(userId, now);
        this.logger.log(`rate limit counters reset for user ${userId}`);
    }

    listViolations(options: { limit?: number; offset?: number; kind?: LimitKind; userId?: string } = {}): Promise<Violation[]> {
        return this.violationsService.list(options);
    }

    private environmentDefaults(): WindowLimits {
        return {
            burst: this.configService.get('RATE_LIMIT_BURST', { infer: true }),
            perConversation: this.configService.get('RATE_LIMIT_PER_CHAT', { infer: true }),
            hourly: this.configService.get('RATE_LIMIT_PER_HOUR', { infer: true }),
            daily: this.configService.get('RATE_LIMIT_PER_DAY', { infer: true }),
        };
    }

    private async latest(): Promise<RateLimitConfig | null> {
        const [row] = await this.configRepository.find({ order: { createdAt: 'DESC' }, take: 1 });
        return row ?? null;
    }

    private async ensureRow(): Promise<RateLimitConfig> {
        const existing = await this.latest();
        if (existing) {
            return existing;
        }
        const defaults = this.environmentDefaults();
        return this.configRepository.create({
            burstLimitPerMinute: defaults.burst,
            perConversationLimit: defaults.perConversation,
            perHourLimit: defaults.hourly,
            perDayLimit: defaults.daily,
            userOverrides: {},
            whitelistedUsers: [],
            updatedBy: null,
        });
    }
}
