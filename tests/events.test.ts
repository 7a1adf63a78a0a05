import { describe, it, expect } from "vitest";
import fs from "node:fs";
import { parseEventLine } from "../src/core/events.js";
import { createEventsWriter } from "../src/core/eventsWriter.js";
import { createLogger } from "../src/core/logger.js";
import { withTmp } from "./helpers/tmp.js";

describe("events", () => {
    it("parses state and log records", () => {
        expect(parseEventLine('{"t":1,"type":"state","sessionId":"s","taskId":"a","data":{"phase":"start"}}')).toEqual({
            t: 1, type: "state", sessionId: "s", taskId: "a", data: { phase: "start" },
        });
        expect(parseEventLine('{"t":1,"type":"log","sessionId":"s","data":{"level":"warn","message":"m"}}')).toEqual({
            t: 1, type: "log", sessionId: "s", data: { level: "warn", message: "m" },
        });
    });

    it("rejects malformed records", () => {
        expect(parseEventLine("not json")).toBeNull();
        expect(parseEventLine('{"t":1,"type":"state","sessionId":"s","data":{"phase":"start"}}')).toBeNull();
        expect(parseEventLine('{"t":1,"type":"log","sessionId":"s","data":{"level":"loud","message":"m"}}')).toBeNull();
        expect(parseEventLine('{"t":1,"type":"state","sessionId":"s","taskId":"a","data":{"phase":"exit","status":"ok"}}')).toBeNull();
    });

    it("appends one JSON line per record through the logger", async () => {
        await withTmp(async ({ path }) => {
            const file = path("logs", "events.ndjson");
            const writer = createEventsWriter(file);
            const logger = createLogger({ writer, sessionId: "s1", now: () => 5 });
            logger.info("hello");
            logger.state("task-1", { phase: "exit", status: "completed" });
            await writer.close();
            logger.info("after close");

            const lines = fs.readFileSync(file, "utf8").trim().split("\n");
            expect(lines.map((l) => parseEventLine(l))).toEqual([
                { t: 5, type: "log", sessionId: "s1", data: { level: "info", message: "hello" } },
                { t: 5, type: "state", sessionId: "s1", taskId: "task-1", data: { phase: "exit", status: "completed" } },
            ]);
        });
    });

    it("throws when the log path cannot be opened", async () => {
        await withTmp(async ({ path }) => {
            const file = path("logs", "events.ndjson");
            fs.mkdirSync(file, { recursive: true });
            expect(() => createEventsWriter(file)).toThrow(/EISDIR/);
        });
    });

    it("closes idempotently after writing", async () => {
        await withTmp(async ({ path }) => {
            const file = path("logs", "events.ndjson");
            const writer = createEventsWriter(file);
            const logger = createLogger({ writer, sessionId: "s1", now: () => 5 });
            logger.warn("once");
            await writer.close();
            await writer.close();
            logger.warn("after close");
            expect(fs.readFileSync(file, "utf8")).toBe(
                '{"t":5,"type":"log","sessionId":"s1","data":{"level":"warn","message":"once"}}\n'
            );
        });
    });
});
