import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import type { MockDelay } from "../core/clock.js";
import { DEFAULT_WORKERS, parsePositiveInt, resolveConfig } from "../core/config.js";
import { formatCliError } from "../core/errors.js";
import { Orchestrator, type ProgressEvent } from "../core/orchestrator.js";
import { DEFAULT_ROLES, loadRoleTable } from "../core/roles.js";

interface RunCliOptions {
    agents: string;
    mock?: boolean;
    mockDelay?: string;
    maxParallel?: string;
    agentBin?: string;
    timeout?: string;
    roles?: string;
    dataDir?: string;
    debug?: boolean;
}

/** 既存ファイルならその中身、そうでなければ文字列そのもの */
export function readMaybeFile(v: string): string {
    const p = path.resolve(v);
    if (fs.existsSync(p) && fs.statSync(p).isFile()) return fs.readFileSync(p, "utf8");
    return v;
}

export function formatProgress(event: ProgressEvent): string | null {
    switch (event.type) {
        case "started":
            return [
                `Orchestrator started: ${event.sessionId}${event.mode === "mock" ? " (MOCK MODE)" : ""}`,
                `Spawning ${event.taskCount} parallel agents...`,
            ].join("\n");
        case "task-finished":
            return `${event.task.status === "completed" ? "✅" : "❌"} ${event.task.label} finished: ${event.task.status}`;
        case "task-crashed":
            return `❌ ${event.task.label} crashed: ${event.error.message}`;
        case "synthesized":
            return `Final synthesis report generated: ${event.reportPath}`;
        case "snapshot":
            return null;
    }
}

export function cmdRun(): Command {
    const cmd = new Command("run");
    cmd
        .description("Derive one task per agent from the objective, run them in parallel and write a synthesis report")
        .argument("<objective>", "Objective text or a path to a file containing it")
        .option("--agents <n>", "Number of parallel agents", String(DEFAULT_WORKERS))
        .option("--mock", "Simulate agents instead of invoking the agent command", false)
        .option("--mock-delay <ms>", "Fixed simulated duration per mock agent (default: random 2000-5000)")
        .option("--max-parallel <n>", "Maximum agents in flight (default: one slot per agent)")
        .option("--agent-bin <path>", "Agent command (default: $PARALLEL_AGENTS_BIN or claude)")
        .option("--timeout <ms>", "Per-agent timeout in ms, 0 for none (default: $PARALLEL_AGENTS_TIMEOUT_MS or 0)")
        .option("--roles <file>", "JSON role table overriding the built-in perspectives")
        .option("--data-dir <dir>", "State/report directory (default: $PARALLEL_AGENTS_DATA_DIR or ~/.claude/data)")
        .option("--debug", "Echo the event log to stderr", false)
        .action(async (objectiveArg: string, opts: RunCliOptions) => {
            const objective = readMaybeFile(objectiveArg).trim();
            if (!objective) {
                throw new Error(formatCliError("run", "objective is required (text or file path)"));
            }
            let agents: number;
            let maxParallel: number | undefined;
            let timeoutMs: number | undefined;
            let mockDelay: MockDelay | undefined;
            try {
                agents = parsePositiveInt(opts.agents, "--agents", true);
                maxParallel = opts.maxParallel ? parsePositiveInt(opts.maxParallel, "--max-parallel") : undefined;
                timeoutMs = opts.timeout ? parsePositiveInt(opts.timeout, "--timeout", true) : undefined;
                if (opts.mockDelay) {
                    const ms = parsePositiveInt(opts.mockDelay, "--mock-delay", true);
                    mockDelay = { minMs: ms, maxMs: ms };
                }
            } catch (err) {
                throw new Error(formatCliError("run", err instanceof Error ? err.message : String(err)));
            }

            const config = resolveConfig({ dataDir: opts.dataDir, agentBin: opts.agentBin, timeoutMs });
            const roles = opts.roles ? loadRoleTable(path.resolve(opts.roles)) : DEFAULT_ROLES;

            const orchestrator = new Orchestrator({
                objective,
                agents,
                mock: Boolean(opts.mock),
                mockDelay,
                maxParallel,
                roles,
                dataDir: config.dataDir,
                agentBin: config.agentBin,
                timeoutMs: config.timeoutMs,
                debug: Boolean(opts.debug),
                onProgress: (event) => {
                    const line = formatProgress(event);
                    if (line) console.log(line);
                },
            });
            const summary = await orchestrator.run();
            console.log(`${summary.completed} completed, ${summary.failed} failed`);
        });

    return cmd;
}
