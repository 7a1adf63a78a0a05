import crypto from "node:crypto";
import type { AgentTask } from "./task.js";
import type { RunMode } from "./types.js";

/** One orchestrator run. The task list is fixed once derived. */
export type Session = {
    readonly id: string;
    readonly objective: string;
    readonly mode: RunMode;
    readonly createdAt: string;
    readonly tasks: readonly AgentTask[];
};

export function createSession(opts: {
    objective: string;
    mode: RunMode;
    tasks: readonly AgentTask[];
    id?: string;
    now?: Date;
}): Session {
    return {
        id: opts.id ?? crypto.randomUUID(),
        objective: opts.objective,
        mode: opts.mode,
        createdAt: (opts.now ?? new Date()).toISOString(),
        tasks: opts.tasks,
    };
}
