export type TaskStatus = "pending" | "running" | "completed" | "failed";

export type RunMode = "mock" | "real";

export type RoleEntry = {
    perspective: string;
    agent: string;
    skills: string[];
};

/** 外部エージェントコマンド 1 回分の結果 */
export type AgentOutcome = {
    exitCode: number;
    stdout: string;
    stderr: string;
};

export interface AgentCommand {
    run(instruction: string): Promise<AgentOutcome>;
}

export interface Clock {
    now(): Date;
    sleep(ms: number): Promise<void>;
    /** [0, 1) */
    random(): number;
}
