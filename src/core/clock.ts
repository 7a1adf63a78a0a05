import type { Clock } from "./types.js";

export const systemClock: Clock = {
    now: () => new Date(),
    sleep: (ms) => new Promise<void>((r) => setTimeout(r, ms)),
    random: () => Math.random(),
};

export type MockDelay = { minMs: number; maxMs: number };

export const DEFAULT_MOCK_DELAY: MockDelay = { minMs: 2000, maxMs: 5000 };

export function pickDelay(clock: Clock, delay: MockDelay = DEFAULT_MOCK_DELAY): number {
    const span = Math.max(0, delay.maxMs - delay.minMs);
    return Math.round(delay.minMs + clock.random() * span);
}
