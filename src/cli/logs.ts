import { Command } from "commander";
import fs from "node:fs";
import { resolveConfig } from "../core/config.js";
import { parseEventLine, type EventRecord } from "../core/events.js";
import { dataPaths } from "../core/paths.js";

export type EventFilter = {
    session?: string;
    task?: string;
    types?: Set<string> | null;
};

interface LogsCliOptions {
    dataDir?: string;
    session?: string;
    task?: string;
    type?: string;
}

export function parseTypes(v?: string): Set<string> | null {
    if (!v) return null;
    const s = new Set<string>();
    for (const t of v.split(",").map((x) => x.trim()).filter(Boolean)) s.add(t);
    return s;
}

/** session / task は前方一致 (短縮 ID 可) */
export function matches(ev: EventRecord, filter: EventFilter): boolean {
    if (filter.session && !ev.sessionId.startsWith(filter.session)) return false;
    if (filter.task && !(ev.taskId ?? "").startsWith(filter.task)) return false;
    if (filter.types && !filter.types.has(ev.type)) return false;
    return true;
}

export function readEvents(file: string, filter: EventFilter = {}): EventRecord[] {
    if (!fs.existsSync(file)) return [];
    const out: EventRecord[] = [];
    for (const ln of fs.readFileSync(file, "utf8").split(/\r?\n/)) {
        if (!ln.trim()) continue;
        const ev = parseEventLine(ln);
        if (ev && matches(ev, filter)) out.push(ev);
    }
    return out;
}

export function formatEvent(ev: EventRecord): string {
    const ts = new Date(ev.t).toISOString();
    const who = `${ev.sessionId.slice(0, 8)}${ev.taskId ? `/${ev.taskId.slice(0, 8)}` : ""}`;
    if (ev.type === "log") {
        return `${ts} ${who} [${ev.data.level}] ${ev.data.message}`;
    }
    switch (ev.data.phase) {
        case "start":
            return `${ts} ${who} state start`;
        case "exit":
            return `${ts} ${who} state exit ${ev.data.status}${ev.data.error ? `: ${ev.data.error}` : ""}`;
        case "crash":
            return `${ts} ${who} state crash: ${ev.data.reason}`;
    }
}

export function cmdLogs(): Command {
    const cmd = new Command("logs");
    cmd
        .description("Print the event log, optionally filtered by session, task and type")
        .option("--data-dir <dir>", "Data directory (default: $PARALLEL_AGENTS_DATA_DIR or ~/.claude/data)")
        .option("--session <id>", "Session id (or prefix)")
        .option("--task <id>", "Task id (or prefix)")
        .option("--type <csv>", "Filter types: state,log")
        .action((opts: LogsCliOptions) => {
            const { eventsFile } = dataPaths(resolveConfig({ dataDir: opts.dataDir }).dataDir);
            const events = readEvents(eventsFile, {
                session: opts.session,
                task: opts.task,
                types: parseTypes(opts.type),
            });
            for (const ev of events) console.log(formatEvent(ev));
        });

    return cmd;
}
