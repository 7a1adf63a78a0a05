import { Command } from "commander";
import fs from "node:fs";
import { parsePositiveInt, resolveConfig } from "../core/config.js";
import { dataPaths } from "../core/paths.js";
import { countTerminal, readState, type StateSnapshot } from "../core/state.js";

interface StatusCliOptions {
    dataDir?: string;
    json?: boolean;
    follow?: boolean;
    duration?: string;
    interval: string;
}

export function formatStatus(snapshot: StateSnapshot): string {
    const lines = [
        `Session ${snapshot.sessionId} (${snapshot.mode}) @ ${snapshot.timestamp}`,
        `Objective: ${snapshot.objective}`,
        `Progress: ${countTerminal(snapshot)}/${snapshot.tasks.length} finished`,
    ];
    const width = Math.max(0, ...snapshot.tasks.map((t) => t.label.length));
    for (const t of snapshot.tasks) {
        const span = `${t.startedAt ?? "-"} -> ${t.endedAt ?? "-"}`;
        const error = t.error ? `  ${t.error.split(/\r?\n/)[0]}` : "";
        lines.push(`  ${t.label.padEnd(width)}  ${t.status.padEnd(9)}  ${span}${error}`);
    }
    return lines.join("\n");
}

export function isFinished(snapshot: StateSnapshot): boolean {
    return countTerminal(snapshot) === snapshot.tasks.length;
}

/**
 * Polls the state file until every task is terminal or durationMs elapses.
 * Calls onChange whenever the snapshot timestamp moves; returns the last one read.
 */
export async function followState(
    stateFile: string,
    durationMs: number,
    intervalMs: number,
    onChange: (snapshot: StateSnapshot) => void
): Promise<StateSnapshot | null> {
    const start = Date.now();
    let last: StateSnapshot | null = null;
    let readError: unknown;
    for (;;) {
        if (fs.existsSync(stateFile)) {
            try {
                const snapshot = readState(stateFile);
                if (!last || snapshot.timestamp !== last.timestamp || snapshot.sessionId !== last.sessionId) {
                    last = snapshot;
                    onChange(snapshot);
                }
            } catch (err) {
                // 書き込み途中を読んだ可能性があるので次の周期で読み直す
                readError = err;
            }
        }
        if (last && isFinished(last)) return last;
        if (Date.now() - start >= durationMs) {
            if (!last && readError) throw readError;
            return last;
        }
        await new Promise((r) => setTimeout(r, intervalMs));
    }
}

export function cmdStatus(): Command {
    const cmd = new Command("status");
    cmd
        .description("Show the live state snapshot of the current (or last) run")
        .option("--data-dir <dir>", "State directory (default: $PARALLEL_AGENTS_DATA_DIR or ~/.claude/data)")
        .option("--json", "Print the raw snapshot as JSON", false)
        .option("--follow", "Keep polling until every task has finished", false)
        .option("--duration <ms>", "Give up following after this many ms", "600000")
        .option("--interval <ms>", "Polling interval milliseconds", "500")
        .action(async (opts: StatusCliOptions) => {
            const { stateFile } = dataPaths(resolveConfig({ dataDir: opts.dataDir }).dataDir);
            const print = (snapshot: StateSnapshot) =>
                console.log(opts.json ? JSON.stringify(snapshot, null, 2) : formatStatus(snapshot));

            if (!opts.follow) {
                if (!fs.existsSync(stateFile)) {
                    throw new Error(`state file not found at ${stateFile}. Start a run first.`);
                }
                print(readState(stateFile));
                return;
            }
            const durationMs = parsePositiveInt(opts.duration ?? "600000", "--duration");
            const intervalMs = parsePositiveInt(opts.interval, "--interval");
            const last = await followState(stateFile, durationMs, intervalMs, print);
            if (!last) {
                throw new Error(`no state snapshot appeared at ${stateFile} within ${durationMs}ms`);
            }
        });

    return cmd;
}
