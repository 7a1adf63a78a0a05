export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type StateEventData =
    | { phase: "start" }
    | { phase: "exit"; status: "completed" | "failed"; error?: string }
    | { phase: "crash"; reason: string };

export type LogEventData = { level: LogLevel; message: string };

export type StateEvent = {
    t: number;
    type: "state";
    sessionId: string;
    taskId: string;
    data: StateEventData;
};

export type LogEvent = {
    t: number;
    type: "log";
    sessionId: string;
    taskId?: string;
    data: LogEventData;
};

export type EventRecord = StateEvent | LogEvent;

function isObject(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null;
}

function isLogLevel(v: unknown): v is LogLevel {
    return LOG_LEVELS.some((level) => level === v);
}

function isStateData(d: Record<string, unknown>): boolean {
    if (d.phase === "start") return true;
    if (d.phase === "exit") {
        return (d.status === "completed" || d.status === "failed")
            && (d.error === undefined || typeof d.error === "string");
    }
    if (d.phase === "crash") return typeof d.reason === "string";
    return false;
}

export function isEventRecord(u: unknown): u is EventRecord {
    if (!isObject(u)) return false;
    const { t, type, sessionId, taskId, data } = u;
    if (typeof t !== "number" || typeof sessionId !== "string" || !isObject(data)) {
        return false;
    }
    if (type === "state") {
        return typeof taskId === "string" && isStateData(data);
    }
    if (type === "log") {
        if (taskId !== undefined && typeof taskId !== "string") return false;
        return isLogLevel(data.level) && typeof data.message === "string";
    }
    return false;
}

export function parseEventLine(line: string): EventRecord | null {
    try {
        const obj: unknown = JSON.parse(line);
        return isEventRecord(obj) ? obj : null;
    } catch {
        return null;
    }
}
