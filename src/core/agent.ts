import { execa, ExecaError } from "execa";
import { AgentTimeoutError } from "./errors.js";
import type { AgentCommand, AgentOutcome } from "./types.js";

export type AgentCommandOptions = {
    bin?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** 0 or undefined: no limit */
    timeoutMs?: number;
};

export const DEFAULT_AGENT_BIN = "claude";

/** `.js` のスタブは node 経由で起動する */
export function buildSpawnArgs(bin: string, instruction: string): { command: string; args: string[] } {
    if (bin.endsWith(".js")) {
        return { command: process.execPath, args: [bin, instruction] };
    }
    return { command: bin, args: [instruction] };
}

function asText(v: unknown): string {
    return typeof v === "string" ? v : "";
}

/**
 * Runs the agent CLI once with the rendered instruction as its only argument.
 * A non-zero exit resolves with the captured output; launch failures and
 * timeouts reject.
 */
export class ExecaAgentCommand implements AgentCommand {
    private readonly bin: string;

    constructor(private readonly opts: AgentCommandOptions = {}) {
        this.bin = opts.bin ?? DEFAULT_AGENT_BIN;
    }

    async run(instruction: string): Promise<AgentOutcome> {
        const { command, args } = buildSpawnArgs(this.bin, instruction);
        const timeout = this.opts.timeoutMs && this.opts.timeoutMs > 0 ? this.opts.timeoutMs : undefined;
        try {
            const { stdout, stderr } = await execa(command, args, {
                cwd: this.opts.cwd,
                env: this.opts.env,
                stdin: "ignore",
                timeout,
            });
            return { exitCode: 0, stdout: asText(stdout), stderr: asText(stderr) };
        } catch (err) {
            if (err instanceof ExecaError) {
                if (err.timedOut && timeout !== undefined) {
                    throw new AgentTimeoutError(timeout, err);
                }
                if (typeof err.exitCode === "number") {
                    return { exitCode: err.exitCode, stdout: asText(err.stdout), stderr: asText(err.stderr) };
                }
            }
            throw err;
        }
    }
}
