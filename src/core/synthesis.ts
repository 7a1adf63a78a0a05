import { reportPathFor, writeFileUtf8 } from "./paths.js";
import type { Session } from "./session.js";

export const NO_OUTPUT_PLACEHOLDER = "No output generated.";

export function buildReport(session: Session): string {
    const completed = session.tasks.filter((t) => t.status === "completed").length;
    const failed = session.tasks.filter((t) => t.status === "failed").length;

    const lines: string[] = [
        "# Parallel Agents Synthesis Report",
        `**Session ID**: ${session.id}`,
        `**Objective**: ${session.objective}`,
        `**Tasks**: ${session.tasks.length} total, ${completed} completed, ${failed} failed`,
        "",
        "---",
        "",
    ];

    for (const t of session.tasks) {
        lines.push(`### ${t.label}`);
        lines.push(`- **Task**: ${t.instruction.slice(0, 100)}...`);
        lines.push(`- **Status**: ${t.status}`);
        if (t.status === "failed" && t.error) {
            lines.push(`- **Error**: ${t.error.trim()}`);
        }
        lines.push("- **Key Findings**:", "");
        lines.push(t.result ? t.result : NO_OUTPUT_PLACEHOLDER, "");
        lines.push("---", "");
    }

    return lines.join("\n");
}

/** Writes the report under reportsDir and returns its path. Never touches task state. */
export function writeReport(session: Session, reportsDir: string): string {
    const file = reportPathFor(reportsDir, session.id);
    writeFileUtf8(file, buildReport(session));
    return file;
}
