import os from "node:os";
import path from "node:path";
import { DEFAULT_AGENT_BIN } from "./agent.js";

export const DEFAULT_WORKERS = 3;

export type ConfigOverrides = {
    dataDir?: string;
    agentBin?: string;
    timeoutMs?: number;
};

export type ResolvedConfig = {
    dataDir: string;
    agentBin: string;
    /** 0 = no limit */
    timeoutMs: number;
};

function nonEmpty(v: string | undefined): string | undefined {
    return v && v.trim().length > 0 ? v : undefined;
}

export function parsePositiveInt(raw: string, label: string, allowZero = false): number {
    const value = Number(raw.trim());
    if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
        throw new Error(`${label} must be a ${allowZero ? "non-negative" : "positive"} integer: ${raw}`);
    }
    return value;
}

/** CLI option > 環境変数 > 既定値 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
    const dataDir = nonEmpty(overrides.dataDir)
        ?? nonEmpty(env.PARALLEL_AGENTS_DATA_DIR)
        ?? path.join(os.homedir(), ".claude", "data");
    const agentBin = nonEmpty(overrides.agentBin) ?? nonEmpty(env.PARALLEL_AGENTS_BIN) ?? DEFAULT_AGENT_BIN;
    const envTimeout = nonEmpty(env.PARALLEL_AGENTS_TIMEOUT_MS);
    const timeoutMs = overrides.timeoutMs
        ?? (envTimeout ? parsePositiveInt(envTimeout, "PARALLEL_AGENTS_TIMEOUT_MS", true) : 0);
    return { dataDir: path.resolve(dataDir), agentBin, timeoutMs };
}
