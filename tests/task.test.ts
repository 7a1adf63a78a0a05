import { describe, it, expect } from "vitest";
import { AgentTimeoutError, TaskStateError } from "../src/core/errors.js";
import { createMemoryEventsWriter } from "../src/core/eventsWriter.js";
import { createLogger } from "../src/core/logger.js";
import { AgentTask } from "../src/core/task.js";
import { fakeAgent, fakeClock, ok } from "./helpers/fakes.js";

function newTask(label = "security-auditor") {
    return new AgentTask({ label, instruction: "Use the agent: Review the login flow", objective: "Review the login flow" });
}

describe("AgentTask", () => {
    it("derives a short default label from the id", () => {
        const task = new AgentTask({ id: "abcd1234-0000", instruction: "x" });
        expect(task.label).toBe("Agent-abcd");
        expect(task.id).toBe("abcd1234-0000");
    });

    it("mock mode sleeps a randomized delay and completes", async () => {
        const clock = fakeClock();
        const task = newTask();

        const returned = await task.execute({ mock: true, clock });

        expect(returned).toBe(task);
        expect(task.status).toBe("completed");
        expect(task.error).toBeUndefined();
        expect(task.result).toBe('MOCK RESULT for security-auditor: Analyzed "Review the login flow..." found 3 issues.');
        // 2000 + 0.5 * (5000 - 2000)
        expect(clock.sleeps).toEqual([3500]);
        expect(task.startedAt).toBe("2026-01-01T00:00:00.000Z");
        expect(task.endedAt).toBe("2026-01-01T00:00:03.500Z");
    });

    it("mock mode honours a custom delay window", async () => {
        const clock = fakeClock(0, 0);
        const task = newTask();
        await task.execute({ mock: true, clock, mockDelay: { minMs: 10, maxMs: 20 } });
        expect(clock.sleeps).toEqual([10]);
        expect(Date.parse(task.endedAt ?? "")).toBeGreaterThanOrEqual(Date.parse(task.startedAt ?? ""));
    });

    it("real mode: exit 0 completes with stdout as the result", async () => {
        const agent = fakeAgent(() => ok("all good"));
        const task = newTask();

        await task.execute({ mock: false, agent, clock: fakeClock() });

        expect(agent.calls).toEqual(["Use the agent: Review the login flow"]);
        expect(task.status).toBe("completed");
        expect(task.result).toBe("all good");
        expect(task.error).toBeUndefined();
    });

    it("real mode: non-zero exit fails with stderr and keeps stdout", async () => {
        const agent = fakeAgent(() => ({ exitCode: 1, stdout: "partial", stderr: "not found" }));
        const task = newTask();

        await task.execute({ mock: false, agent, clock: fakeClock() });

        expect(task.status).toBe("failed");
        expect(task.error).toBe("not found");
        expect(task.result).toBe("partial");
        expect(task.endedAt).not.toBeNull();
    });

    it("real mode: non-zero exit with silent stderr still records an error", async () => {
        const agent = fakeAgent(() => ({ exitCode: 2, stdout: "", stderr: "" }));
        const task = newTask();
        await task.execute({ mock: false, agent, clock: fakeClock() });
        expect(task.status).toBe("failed");
        expect(task.error).toBe("exited with code 2");
    });

    it("captures launch failures instead of rejecting", async () => {
        const agent = fakeAgent(() => {
            throw new Error("spawn claude ENOENT");
        });
        const task = newTask();

        await expect(task.execute({ mock: false, agent, clock: fakeClock() })).resolves.toBe(task);
        expect(task.status).toBe("failed");
        expect(task.error).toBe("spawn claude ENOENT");
        expect(task.result).toBe("");
    });

    it("records a timeout as a failure", async () => {
        const agent = fakeAgent(() => {
            throw new AgentTimeoutError(50);
        });
        const task = newTask();
        await task.execute({ mock: false, agent, clock: fakeClock() });
        expect(task.status).toBe("failed");
        expect(task.error).toBe("timed out after 50ms");
    });

    it("fails when real mode has no agent command", async () => {
        const task = newTask();
        await task.execute({ mock: false, clock: fakeClock() });
        expect(task.status).toBe("failed");
        expect(task.error).toBe("no agent command configured");
    });

    it("refuses to run twice", async () => {
        const task = newTask();
        await task.execute({ mock: true, clock: fakeClock() });
        await expect(task.execute({ mock: true, clock: fakeClock() })).rejects.toBeInstanceOf(TaskStateError);
        expect(task.status).toBe("completed");
    });

    it("logs start and exit state records", async () => {
        const writer = createMemoryEventsWriter();
        const logger = createLogger({ writer, sessionId: "s1", now: () => 42 });
        const agent = fakeAgent(() => ({ exitCode: 1, stdout: "", stderr: "boom" }));
        const task = newTask();

        await task.execute({ mock: false, agent, clock: fakeClock(), logger });

        const states = writer.records.filter((r) => r.type === "state");
        expect(states).toEqual([
            { t: 42, type: "state", sessionId: "s1", taskId: task.id, data: { phase: "start" } },
            { t: 42, type: "state", sessionId: "s1", taskId: task.id, data: { phase: "exit", status: "failed", error: "boom" } },
        ]);
    });
});

describe("AgentTask.markCrashed", () => {
    it("fails a task that never reached a terminal state", () => {
        const task = newTask();
        const now = new Date("2026-02-01T10:00:00.000Z");

        expect(task.markCrashed("dispatch blew up", now)).toBe(true);
        expect(task.status).toBe("failed");
        expect(task.error).toBe("dispatch blew up");
        expect(task.startedAt).toBe("2026-02-01T10:00:00.000Z");
        expect(task.endedAt).toBe("2026-02-01T10:00:00.000Z");
    });

    it("leaves a terminal task untouched", async () => {
        const task = newTask();
        await task.execute({ mock: true, clock: fakeClock() });
        const endedAt = task.endedAt;

        expect(task.markCrashed("late")).toBe(false);
        expect(task.status).toBe("completed");
        expect(task.error).toBeUndefined();
        expect(task.endedAt).toBe(endedAt);
    });
});
