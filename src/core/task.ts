import crypto from "node:crypto";
import { systemClock, pickDelay, type MockDelay } from "./clock.js";
import { TaskStateError, errorMessage } from "./errors.js";
import { noopLogger, type Logger } from "./logger.js";
import type { AgentCommand, Clock, TaskStatus } from "./types.js";

export type TaskInit = {
    id?: string;
    label?: string;
    instruction: string;
    /** mock 出力に埋め込む元の objective */
    objective?: string;
};

export type ExecuteOptions = {
    mock: boolean;
    /** real mode only */
    agent?: AgentCommand;
    clock?: Clock;
    mockDelay?: MockDelay;
    logger?: Logger;
};

function preview(text: string, n: number): string {
    return text.slice(0, n);
}

/**
 * One agent invocation. Status only moves forward:
 * pending -> running -> completed | failed.
 */
export class AgentTask {
    readonly id: string;
    readonly label: string;
    readonly instruction: string;
    readonly objective?: string;

    private _status: TaskStatus = "pending";
    private _startedAt: string | null = null;
    private _endedAt: string | null = null;
    private _result = "";
    private _error?: string;

    constructor(init: TaskInit) {
        this.id = init.id ?? crypto.randomUUID();
        this.label = init.label || `Agent-${this.id.slice(0, 4)}`;
        this.instruction = init.instruction;
        this.objective = init.objective;
    }

    get status(): TaskStatus {
        return this._status;
    }
    get startedAt(): string | null {
        return this._startedAt;
    }
    get endedAt(): string | null {
        return this._endedAt;
    }
    get result(): string {
        return this._result;
    }
    get error(): string | undefined {
        return this._error;
    }

    isTerminal(): boolean {
        return this._status === "completed" || this._status === "failed";
    }

    /**
     * Runs the task once. Agent failures end up in `status`/`error`;
     * the returned promise only rejects when the task is not pending.
     */
    async execute(opts: ExecuteOptions): Promise<this> {
        if (this._status !== "pending") {
            throw new TaskStateError(this.id, this._status);
        }
        const clock = opts.clock ?? systemClock;
        const logger = opts.logger ?? noopLogger;

        this._status = "running";
        this._startedAt = clock.now().toISOString();
        logger.state(this.id, { phase: "start" });
        logger.debug(`execute ${this.label} (mock=${opts.mock})`, this.id);

        try {
            if (opts.mock) {
                const delay = pickDelay(clock, opts.mockDelay);
                logger.debug(`mock execution ${this.label}, sleep=${delay}ms`, this.id);
                await clock.sleep(delay);
                const subject = preview(this.objective ?? this.instruction, 30);
                this._result = `MOCK RESULT for ${this.label}: Analyzed "${subject}..." found 3 issues.`;
                this._status = "completed";
            } else {
                if (!opts.agent) {
                    throw new Error("no agent command configured");
                }
                logger.debug(`real execution: ${preview(this.instruction, 50)}...`, this.id);
                const outcome = await opts.agent.run(this.instruction);
                logger.debug(`process finished: ${this.label}, exitCode=${outcome.exitCode}`, this.id);
                this._result = outcome.stdout;
                if (outcome.exitCode === 0) {
                    this._status = "completed";
                } else {
                    this._status = "failed";
                    this._error = outcome.stderr.trim() ? outcome.stderr : `exited with code ${outcome.exitCode}`;
                    logger.warn(`${this.label} failed: ${preview(this._error, 100)}`, this.id);
                }
            }
        } catch (err) {
            this._status = "failed";
            this._error = errorMessage(err) || "unknown error";
            logger.warn(`${this.label} exception: ${this._error}`, this.id);
        }

        this._endedAt = clock.now().toISOString();
        logger.state(this.id, this.exitData());
        return this;
    }

    /**
     * Pool boundary fallback: a dispatch that blew up outside `execute`.
     * Returns false when the task already reached a terminal state.
     */
    markCrashed(reason: string, now: Date = new Date()): boolean {
        if (this.isTerminal()) return false;
        const stamp = now.toISOString();
        this._startedAt ??= stamp;
        this._endedAt = stamp;
        this._status = "failed";
        this._error = reason || "crashed";
        return true;
    }

    private exitData() {
        if (this._status === "failed") {
            return { phase: "exit" as const, status: "failed" as const, error: this._error };
        }
        return { phase: "exit" as const, status: "completed" as const };
    }
}
