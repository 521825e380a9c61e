import {
    DeniedDecision,
    RateLimitPolicy,
    RateWindow,
    TimedWindowKind,
    UserWindows,
    WINDOW_DURATION_MS,
    WindowLimits,
} from './types';

const TIMED_KINDS: TimedWindowKind[] = ['burst', 'hourly', 'daily'];

export function freshWindows(now: Date): UserWindows {
    return {
        burst: { count: 0, windowStart: now },
        hourly: { count: 0, windowStart: now },
        daily: { count: 0, windowStart: now },
    };
}

export function isExpired(window: RateWindow, kind: TimedWindowKind, now: Date): boolean {
    return now.getTime() - window.windowStart.getTime() >= WINDOW_DURATION_MS[kind];
}

/** Count as it should be read for a check at `now`; an expired window reads as empty. */
export function currentCount(window: RateWindow, kind: TimedWindowKind, now: Date): number {
    return isExpired(window, kind, now) ? 0 : window.count;
}

export function resetAt(window: RateWindow, kind: TimedWindowKind, now: Date): Date | undefined {
    if (isExpired(window, kind, now)) {
        return undefined;
    }
    return new Date(window.windowStart.getTime() + WINDOW_DURATION_MS[kind]);
}

/**
 * Increment-with-reset for every timed window: a window past its duration restarts
 * at `now` with count 1, any other window counts one more.
 */
export function advanceWindows(windows: UserWindows, now: Date): UserWindows {
    const next = { ...windows };
    for (const kind of TIMED_KINDS) {
        const window = windows[kind];
        next[kind] = isExpired(window, kind, now)
            ? { count: 1, windowStart: now }
            : { count: window.count + 1, windowStart: window.windowStart };
    }
    return next;
}

/** Per-user override wins window by window; anything not overridden uses the global value. */
export function resolveLimits(policy: RateLimitPolicy, userId: string): WindowLimits {
    const override = policy.overrides[userId] ?? {};
    return {
        burst: override.burst ?? policy.defaults.burst,
        perConversation: override.perConversation ?? policy.defaults.perConversation,
        hourly: override.hourly ?? policy.defaults.hourly,
        daily: override.daily ?? policy.defaults.daily,
    };
}

/** First breached limit in burst, per-conversation, hourly, daily order, or null. */
export function findBreach(
    windows: UserWindows,
    perConversationCount: number,
    limits: WindowLimits,
    now: Date,
): DeniedDecision | null {
    const burst = currentCount(windows.burst, 'burst', now);
    if (burst >= limits.burst) {
        return { allowed: false, kind: 'burst', limit: limits.burst, used: burst, resetAt: resetAt(windows.burst, 'burst', now) };
    }

    if (perConversationCount >= limits.perConversation) {
        return { allowed: false, kind: 'per_conversation', limit: limits.perConversation, used: perConversationCount };
    }

    const hourly = currentCount(windows.hourly, 'hourly', now);
    if (hourly >= limits.hourly) {
        return { allowed: false, kind: 'hourly', limit: limits.hourly, used: hourly, resetAt: resetAt(windows.hourly, 'hourly', now) };
    }

    const daily = currentCount(windows.daily, 'daily', now);
    if (daily >= limits.daily) {
        return { allowed: false, kind: 'daily', limit: limits.daily, used: daily, resetAt: resetAt(windows.daily, 'daily', now) };
    }

    return null;
}
