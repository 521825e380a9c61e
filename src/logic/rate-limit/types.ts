export type LimitKind = 'burst' | 'per_conversation' | 'hourly' | 'daily';

/** The three time-bounded windows kept by the counter store. */
export type TimedWindowKind = Exclude<LimitKind, 'per_conversation'>;

export const WINDOW_DURATION_MS: Record<TimedWindowKind, number> = {
    burst: 60_000,
    hourly: 3_600_000,
    daily: 86_400_000,
};

export interface RateWindow {
    count: number;
    windowStart: Date;
}

export type UserWindows = Record<TimedWindowKind, RateWindow>;

export interface WindowLimits {
    burst: number;
    perConversation: number;
    hourly: number;
    daily: number;
}

export type WindowLimitOverrides = Partial<WindowLimits>;

export type WindowUsage = WindowLimits;

export interface RateLimitPolicy {
    defaults: WindowLimits;
    overrides: Record<string, WindowLimitOverrides>;
    whitelist: ReadonlySet<string>;
}

export interface Violation {
    userId: string;
    conversationId?: string;
    kind: LimitKind;
    limit: number;
    used: number;
    timestamp: Date;
    userMessage?: string;
    clientAddress?: string;
    userAgent?: string;
}

export type AdmissionDecision =
    | { allowed: true; whitelisted: false; usage: WindowUsage; limits: WindowLimits }
    | { allowed: true; whitelisted: true }
    | { allowed: false; kind: LimitKind; limit: number; used: number; resetAt?: Date };

export type DeniedDecision = Extract<AdmissionDecision, { allowed: false }>;

/** Who is asking; the optional fields only end up on the violation record. */
export interface AdmissionRequest {
    userId: string;
    conversationId: string;
    userMessage?: string;
    clientAddress?: string;
    userAgent?: string;
}

export interface UsageSnapshot {
    whitelisted: boolean;
    usage: WindowUsage;
    limits: WindowLimits;
}
