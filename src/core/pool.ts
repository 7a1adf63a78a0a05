import { errorMessage } from "./errors.js";
import { noopLogger, type Logger } from "./logger.js";
import type { AgentTask } from "./task.js";

export type PoolOutcome = {
    task: AgentTask;
    /** set when the dispatch itself rejected (not an agent failure) */
    crashed?: Error;
};

export type RunAllOpts = {
    /** 既定: タスク数 (1 タスク 1 スロット) */
    maxParallel?: number;
    dispatch: (task: AgentTask) => Promise<unknown>;
    logger?: Logger;
    now?: () => Date;
};

type Settled = { index: number; outcome: PoolOutcome };

/**
 * Runs every task with at most `maxParallel` in flight and yields each one
 * as it finishes, in completion order. A rejected dispatch is logged and
 * reported as a failed task; the other tasks keep running.
 */
export async function* runAll(tasks: readonly AgentTask[], opts: RunAllOpts): AsyncGenerator<PoolOutcome> {
    const logger = opts.logger ?? noopLogger;
    const now = opts.now ?? (() => new Date());
    const limit = Math.max(1, opts.maxParallel && opts.maxParallel > 0 ? opts.maxParallel : tasks.length);
    const inFlight = new Map<number, Promise<Settled>>();
    let next = 0;

    const launch = (index: number) => {
        const task = tasks[index];
        const settled = Promise.resolve()
            .then(() => opts.dispatch(task))
            .then(
                (): Settled => ({ index, outcome: { task } }),
                (err: unknown): Settled => {
                    const crashed = err instanceof Error ? err : new Error(errorMessage(err));
                    logger.error(`${task.label} crashed: ${crashed.name}: ${crashed.message}`, task.id);
                    if (task.markCrashed(crashed.message, now())) {
                        logger.state(task.id, { phase: "crash", reason: crashed.message });
                    }
                    return { index, outcome: { task, crashed } };
                }
            );
        inFlight.set(index, settled);
    };

    const fill = () => {
        while (inFlight.size < limit && next < tasks.length) {
            launch(next++);
        }
    };

    fill();
    logger.debug(`submitted ${inFlight.size}/${tasks.length} tasks (limit=${limit})`);
    while (inFlight.size > 0) {
        const { index, outcome } = await Promise.race(inFlight.values());
        inFlight.delete(index);
        fill();
        yield outcome;
    }
}
