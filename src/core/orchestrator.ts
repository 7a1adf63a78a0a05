import crypto from "node:crypto";
import { ExecaAgentCommand } from "./agent.js";
import { systemClock, type MockDelay } from "./clock.js";
import { deriveTasks } from "./deriver.js";
import { errorMessage } from "./errors.js";
import { createEventsWriter, type EventsWriter } from "./eventsWriter.js";
import { createLogger, type Logger } from "./logger.js";
import { dataPaths, ensureDataDirs, type DataPaths } from "./paths.js";
import { runAll } from "./pool.js";
import { DEFAULT_ROLES } from "./roles.js";
import { createSession, type Session } from "./session.js";
import { StateRecorder, type StateSnapshot } from "./state.js";
import { writeReport } from "./synthesis.js";
import type { AgentTask } from "./task.js";
import type { AgentCommand, Clock, RoleEntry, RunMode } from "./types.js";

export type ProgressEvent =
    | { type: "started"; sessionId: string; mode: RunMode; taskCount: number }
    | { type: "snapshot"; snapshot: StateSnapshot }
    | { type: "task-finished"; task: AgentTask }
    | { type: "task-crashed"; task: AgentTask; error: Error }
    | { type: "synthesized"; reportPath: string };

export type OrchestratorOptions = {
    objective: string;
    agents: number;
    mock?: boolean;
    dataDir: string;
    maxParallel?: number;
    roles?: readonly RoleEntry[];
    /** real mode: defaults to ExecaAgentCommand(agentBin, timeoutMs) */
    agent?: AgentCommand;
    agentBin?: string;
    timeoutMs?: number;
    clock?: Clock;
    mockDelay?: MockDelay;
    sessionId?: string;
    /** stderr へログを echo (--debug) */
    debug?: boolean;
    /** 既定は <dataDir>/logs/events.ndjson への追記 */
    events?: EventsWriter;
    onProgress?: (event: ProgressEvent) => void;
};

export type RunSummary = {
    sessionId: string;
    statePath: string;
    reportPath: string;
    tasks: readonly AgentTask[];
    completed: number;
    failed: number;
};

export class Orchestrator {
    readonly sessionId: string;
    readonly paths: DataPaths;
    private readonly clock: Clock;

    constructor(private readonly opts: OrchestratorOptions) {
        this.sessionId = opts.sessionId ?? crypto.randomUUID();
        this.paths = dataPaths(opts.dataDir);
        this.clock = opts.clock ?? systemClock;
    }

    /**
     * derive -> snapshot -> pool (snapshot per completion) -> synthesize.
     * Task failures stay in task state; only storage or derivation errors reject.
     */
    async run(): Promise<RunSummary> {
        ensureDataDirs(this.paths);
        const events = this.opts.events ?? createEventsWriter(this.paths.eventsFile);
        const logger = createLogger({
            writer: events,
            sessionId: this.sessionId,
            echo: this.opts.debug,
            now: () => this.clock.now().getTime(),
        });
        let summary: RunSummary;
        try {
            summary = await this.runSession(logger);
        } catch (err) {
            logger.error(`orchestrator error: ${err instanceof Error ? `${err.name}: ${err.message}` : String(err)}`);
            try {
                await events.close();
            } catch (closeErr) {
                // 元のエラーを優先して投げる
                console.error(`event log: ${errorMessage(closeErr)}`);
            }
            throw err;
        }
        // イベントログに書けなかった場合もストレージ障害として reject
        await events.close();
        return summary;
    }

    private async runSession(logger: Logger): Promise<RunSummary> {
        const mode: RunMode = this.opts.mock ? "mock" : "real";
        logger.info(`run: session=${this.sessionId.slice(0, 8)}, agents=${this.opts.agents}, mode=${mode}`);

        const tasks = deriveTasks(this.opts.objective, this.opts.agents, this.opts.roles ?? DEFAULT_ROLES);
        for (const t of tasks) logger.debug(`task created: ${t.label}`, t.id);
        const session = createSession({
            id: this.sessionId,
            objective: this.opts.objective,
            mode,
            tasks,
            now: this.clock.now(),
        });

        const recorder = new StateRecorder(this.paths.stateFile, () => this.clock.now());
        this.snapshot(recorder, session, logger);
        this.emit({ type: "started", sessionId: session.id, mode, taskCount: tasks.length });

        const agent = this.opts.mock ? undefined : this.resolveAgent();
        const outcomes = runAll(session.tasks, {
            maxParallel: this.opts.maxParallel,
            logger,
            now: () => this.clock.now(),
            dispatch: (task) =>
                task.execute({
                    mock: mode === "mock",
                    agent,
                    clock: this.clock,
                    mockDelay: this.opts.mockDelay,
                    logger,
                }),
        });

        // 完了を1件ずつ取り出すので state の書き込みは直列になる
        for await (const { task, crashed } of outcomes) {
            if (crashed) {
                this.emit({ type: "task-crashed", task, error: crashed });
            } else {
                logger.info(`task ${task.label} finished: ${task.status}`, task.id);
                this.emit({ type: "task-finished", task });
            }
            this.snapshot(recorder, session, logger);
        }

        const reportPath = writeReport(session, this.paths.reportsDir);
        logger.info(`synthesis report saved: ${reportPath}`);
        this.emit({ type: "synthesized", reportPath });

        return {
            sessionId: session.id,
            statePath: this.paths.stateFile,
            reportPath,
            tasks: session.tasks,
            completed: tasks.filter((t) => t.status === "completed").length,
            failed: tasks.filter((t) => t.status === "failed").length,
        };
    }

    private resolveAgent(): AgentCommand {
        return this.opts.agent ?? new ExecaAgentCommand({ bin: this.opts.agentBin, timeoutMs: this.opts.timeoutMs });
    }

    private snapshot(recorder: StateRecorder, session: Session, logger: Logger) {
        const snapshot = recorder.record(session);
        logger.debug(`state saved: ${snapshot.tasks.length} tasks`);
        this.emit({ type: "snapshot", snapshot });
    }

    private emit(event: ProgressEvent) {
        this.opts.onProgress?.(event);
    }
}
