import type { LogLevel, StateEventData } from "./events.js";
import type { EventsWriter } from "./eventsWriter.js";

export interface Logger {
    debug(message: string, taskId?: string): void;
    info(message: string, taskId?: string): void;
    warn(message: string, taskId?: string): void;
    error(message: string, taskId?: string): void;
    /** task の状態遷移を state レコードとして残す */
    state(taskId: string, data: StateEventData): void;
}

export type LoggerOptions = {
    writer?: EventsWriter;
    sessionId: string;
    /** stderr にも `[level] message` を出す (--debug) */
    echo?: boolean;
    now?: () => number;
};

export function createLogger(opts: LoggerOptions): Logger {
    const now = opts.now ?? Date.now;
    const log = (level: LogLevel, message: string, taskId?: string) => {
        opts.writer?.write({
            t: now(),
            type: "log",
            sessionId: opts.sessionId,
            ...(taskId ? { taskId } : {}),
            data: { level, message },
        });
        if (opts.echo) {
            console.error(`[${level}] ${message}`);
        }
    };
    return {
        debug: (message, taskId) => log("debug", message, taskId),
        info: (message, taskId) => log("info", message, taskId),
        warn: (message, taskId) => log("warn", message, taskId),
        error: (message, taskId) => log("error", message, taskId),
        state(taskId, data) {
            opts.writer?.write({ t: now(), type: "state", sessionId: opts.sessionId, taskId, data });
        },
    };
}

export const noopLogger: Logger = createLogger({ sessionId: "" });
