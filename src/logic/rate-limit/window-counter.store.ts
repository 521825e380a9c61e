import { DeniedDecision, UserWindows } from './types';

export const WINDOW_COUNTER_STORE = Symbol('WINDOW_COUNTER_STORE');

/** Decides on the user's windows while the store holds them locked. */
export interface CounterGuard {
    /** A returned breach leaves every counter untouched. */
    check(windows: UserWindows): Promise<DeniedDecision | null>;
    /** Runs after the increment is written, before the lock is released. */
    onAdmitted(windows: UserWindows): Promise<void>;
}

export type GuardedIncrement =
    | { admitted: true; windows: UserWindows }
    | { admitted: false; breach: DeniedDecision };

/**
 * Per-user rolling counters. Every call must be atomic for its user: in particular
 * `incrementWithReset` is one read-modify-write, never a read and a later write,
 * and `incrementIfAllowed` reads, checks and increments under a single lock so
 * that no other writer, in this process or another, sees the windows in between.
 */
export interface WindowCounterStore {
    getOrCreate(userId: string, now: Date): Promise<UserWindows>;
    incrementWithReset(userId: string, now: Date): Promise<UserWindows>;
    incrementIfAllowed(userId: string, now: Date, guard: CounterGuard): Promise<GuardedIncrement>;
    reset(userId: string, now: Date): Promise<void>;
}
