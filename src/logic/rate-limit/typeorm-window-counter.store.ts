import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { RateLimitTracking } from '../../entities';
import { UserWindows } from './types';
import { CounterGuard, GuardedIncrement, WindowCounterStore } from './window-counter.store';
import { advanceWindows } from './windows';

function toWindows(row: RateLimitTracking): UserWindows {
    return {
        burst: { count: row.minuteCount, windowStart: row.minuteWindowStart },
        hourly: { count: row.hourCount, windowStart: row.hourWindowStart },
        daily: { count: row.dayCount, windowStart: row.dayWindowStart },
    };
}

function toColumns(windows: UserWindows): Partial<RateLimitTracking> {
    return {
        minuteCount: windows.burst.count,
        minuteWindowStart: windows.burst.windowStart,
        hourCount: windows.hourly.count,
        hourWindowStart: windows.hourly.windowStart,
        dayCount: windows.daily.count,
        dayWindowStart: windows.daily.windowStart,
    };
}

/**
 * Counters live in `rate_limit_tracking`, one row per user. Every operation runs in
 * a transaction holding the row's write lock (`SELECT ... FOR UPDATE`), so
 * concurrent admissions for one user queue up in the database, across app
 * instances, instead of reading the same pre-increment counts.
 */
@Injectable()
export class TypeOrmWindowCounterStore implements WindowCounterStore {
    constructor(@InjectDataSource() private readonly dataSource: DataSource) { }

    async getOrCreate(userId: string, now: Date): Promise<UserWindows> {
        return this.dataSource.transaction(async (manager) => toWindows(await this.lockRow(manager, userId, now)));
    }

    async incrementWithReset(userId: string, now: Date): Promise<UserWindows> {
        return this.dataSource.transaction(async (manager) => {
            const row = await this.lockRow(manager, userId, now);
            return this.increment(manager, userId, toWindows(row), now);
        });
    }

    async incrementIfAllowed(userId: string, now: Date, guard: CounterGuard): Promise<GuardedIncrement> {
        return this.dataSource.transaction(async (manager): Promise<GuardedIncrement> => {
            const row = await this.lockRow(manager, userId, now);
            const breach = await guard.check(toWindows(row));
            if (breach) {
                return { admitted: false, breach };
            }
            const next = await this.increment(manager, userId, toWindows(row), now);
            await guard.onAdmitted(next);
            return { admitted: true, windows: next };
        });
    }

    async reset(userId: string, now: Date): Promise<void> {
        await this.dataSource.transaction(async (manager) => {
            await this.lockRow(manager, userId, now);
            await manager.update(RateLimitTracking, { userId }, {
                minuteCount: 0,
                minuteWindowStart: now,
                hourCount: 0,
                hourWindowStart: now,
                dayCount: 0,
                dayWindowStart: now,
            });
        });
    }

    private async increment(manager: EntityManager, userId: string, windows: UserWindows, now: Date): Promise<UserWindows> {
        const next = advanceWindows(windows, now);
        await manager.update(RateLimitTracking, { userId }, { ...toColumns(next), lastPromptAt: now });
        return next;
    }

    private async lockRow(manager: EntityManager, userId: string, now: Date): Promise<RateLimitTracking> {
        // first request of a user races on the unique index; the loser's insert is ignored
        await manager
            .createQueryBuilder()
            .insert()
            .into(RateLimitTracking)
            .values({
                userId,
                minuteCount: 0,
                minuteWindowStart: now,
                hourCount: 0,
                hourWindowStart: now,
                dayCount: 0,
                dayWindowStart: now,
            })
            .orIgnore()
            .execute();

        const row = await manager.findOne(RateLimitTracking, {
            where: { userId },
            lock: { mode: 'pessimistic_write' },
        });
        if (!row) {
            throw new Error(`rate limit tracking row for user ${userId} could not be created`);
        }
        return row;
    }
}
