import fs from "node:fs";
import { z, ZodError } from "zod";
import { StateValidationError, errorMessage } from "./errors.js";
import { writeFileAtomic } from "./paths.js";
import type { Session } from "./session.js";

export const RESULT_PREVIEW_LENGTH = 200;

const isoDate = z.string().refine((value) => Number.isFinite(Date.parse(value)), {
    message: "must be an ISO date string",
});

const taskSnapshotSchema = z.object({
    id: z.string().min(1),
    label: z.string(),
    status: z.enum(["pending", "running", "completed", "failed"]),
    startedAt: isoDate.nullable(),
    endedAt: isoDate.nullable(),
    resultPreview: z.string(),
    error: z.string().optional(),
});

const stateSnapshotSchema = z.object({
    version: z.literal(1),
    sessionId: z.string().min(1),
    timestamp: isoDate,
    objective: z.string(),
    mode: z.enum(["mock", "real"]),
    tasks: z.array(taskSnapshotSchema),
});

export type TaskSnapshot = z.infer<typeof taskSnapshotSchema>;
export type StateSnapshot = z.infer<typeof stateSnapshotSchema>;

export function buildSnapshot(session: Session, now: Date = new Date()): StateSnapshot {
    return {
        version: 1,
        sessionId: session.id,
        timestamp: now.toISOString(),
        objective: session.objective,
        mode: session.mode,
        tasks: session.tasks.map((t) => ({
            id: t.id,
            label: t.label,
            status: t.status,
            startedAt: t.startedAt,
            endedAt: t.endedAt,
            resultPreview: t.result.slice(0, RESULT_PREVIEW_LENGTH),
            ...(t.error !== undefined ? { error: t.error } : {}),
        })),
    };
}

export function countTerminal(snapshot: StateSnapshot): number {
    return snapshot.tasks.filter((t) => t.status === "completed" || t.status === "failed").length;
}

export function validateState(candidate: unknown): StateSnapshot {
    try {
        return stateSnapshotSchema.parse(candidate);
    } catch (err) {
        if (err instanceof ZodError) {
            const first = err.issues[0];
            const pathStr = first?.path?.length ? first.path.join(".") : "<root>";
            throw new StateValidationError(
                `State snapshot validation failed at ${pathStr}: ${first?.message ?? err.message}`,
                err
            );
        }
        throw new StateValidationError("State snapshot validation failed", err);
    }
}

export function readState(filePath: string): StateSnapshot {
    try {
        const raw = fs.readFileSync(filePath, "utf8");
        return validateState(JSON.parse(raw));
    } catch (err) {
        if (err instanceof StateValidationError) {
            throw err;
        }
        throw new StateValidationError(`Failed to read state at ${filePath}: ${errorMessage(err)}`, err);
    }
}

/**
 * Overwrites the shared state file. Callers serialize `record` calls; there
 * is no locking here.
 */
export class StateRecorder {
    constructor(
        readonly filePath: string,
        private readonly now: () => Date = () => new Date()
    ) { }

    record(session: Session): StateSnapshot {
        const snapshot = buildSnapshot(session, this.now());
        writeFileAtomic(this.filePath, `${JSON.stringify(snapshot, null, 2)}\n`);
        return snapshot;
    }
}
