import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { cmdLogs } from "./logs.js";
import { cmdRun } from "./run.js";
import { cmdStatus } from "./status.js";

const packageInfoSchema = z.object({
    name: z.string().optional(),
    version: z.string().optional(),
    description: z.string().optional(),
});

type PackageInfo = z.infer<typeof packageInfoSchema>;

// src/cli と dist/cli のどちらからでも ../../package.json
function readPackageInfo(): PackageInfo {
    const moduleDir = path.dirname(fileURLToPath(import.meta.url));
    try {
        const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(moduleDir, "..", "..", "package.json"), "utf8"));
        const parsed = packageInfoSchema.safeParse(raw);
        return parsed.success ? parsed.data : {};
    } catch {
        return {};
    }
}

export function createProgram(): Command {
    const { name, version, description } = readPackageInfo();
    const program = new Command();
    program
        .name(name || "parallel-agents")
        .description(description || "Run several agents in parallel on one objective and synthesize their results")
        .version(version ?? "0.0.0");

    program.addCommand(cmdRun());
    program.addCommand(cmdStatus());
    program.addCommand(cmdLogs());

    return program;
}
