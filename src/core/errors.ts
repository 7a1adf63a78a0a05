export function formatCliError(cmd: string, reason: string, hint?: string) {
    return [
        `[parallel-agents ${cmd}]`,
        reason.trim(),
        hint ? `Hint: ${hint.trim()}` : ""
    ].filter(Boolean).join(" ");
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

class ChainedError extends Error {
    constructor(name: string, message: string, cause?: unknown) {
        super(message, cause !== undefined ? { cause } : undefined);
        this.name = name;
        if (cause instanceof Error && cause.stack && !this.stack?.includes(cause.stack)) {
            this.stack += `\nCaused by: ${cause.stack}`;
        }
    }
}

export class DerivationError extends ChainedError {
    constructor(message: string, cause?: unknown) {
        super("DerivationError", message, cause);
    }
}

export class RoleTableError extends ChainedError {
    constructor(message: string, cause?: unknown) {
        super("RoleTableError", message, cause);
    }
}

export class StateValidationError extends ChainedError {
    constructor(message: string, cause?: unknown) {
        super("StateValidationError", message, cause);
    }
}

/** Raised when a task is asked to run twice. */
export class TaskStateError extends ChainedError {
    readonly taskId: string;
    constructor(taskId: string, status: string) {
        super("TaskStateError", `task ${taskId} is ${status}, expected pending`);
        this.taskId = taskId;
    }
}

export class AgentTimeoutError extends ChainedError {
    readonly timeoutMs: number;
    constructor(timeoutMs: number, cause?: unknown) {
        super("AgentTimeoutError", `timed out after ${timeoutMs}ms`, cause);
        this.timeoutMs = timeoutMs;
    }
}
