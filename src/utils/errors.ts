export type ToolErrorReason = 'not_found' | 'timeout' | 'execution_failure' | 'invalid_arguments';

/** Raised inside the tool layer; always converted into a failed ToolResult before it leaves. */
export class ToolInvocationError extends Error {
    constructor(
        readonly reason: ToolErrorReason,
        readonly toolName: string,
        message?: string,
    ) {
        super(message ?? `${reason}: ${toolName}`);
        this.name = 'ToolInvocationError';
    }
}

/** Provider-level failure. Ends the turn. */
export class OrchestrationFault extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'OrchestrationFault';
    }
}

/** The client connection can no longer take events. */
export class TransportError extends Error {
    constructor(message = 'connection is closed') {
        super(message);
        this.name = 'TransportError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
