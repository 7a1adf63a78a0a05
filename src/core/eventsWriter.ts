import fs from "node:fs";
import path from "node:path";
import type { EventRecord } from "./events.js";

export type EventsWriter = {
    write(obj: EventRecord): void;
    close(): Promise<void>;
};

/**
 * Append-only NDJSON writer. The file is opened synchronously so an
 * unopenable log throws here; later stream errors make `close()` reject.
 */
export function createEventsWriter(filepath: string): EventsWriter {
    fs.mkdirSync(path.dirname(filepath), { recursive: true });
    const fd = fs.openSync(filepath, "a");
    const ws = fs.createWriteStream(filepath, { fd, flags: "a" });
    let queued = 0;
    let closed = false;
    let failure: Error | undefined;
    ws.on("error", (err) => {
        failure ??= err;
    });
    return {
        write(obj: EventRecord) {
            if (closed || failure) return;
            // 行バッファ詰まり対策で軽くcork/uncork
            if (++queued % 200 === 0) ws.cork();
            ws.write(JSON.stringify(obj) + "\n");
            if (queued % 200 === 0) process.nextTick(() => ws.uncork());
        },
        async close() {
            if (!closed) {
                closed = true;
                if (failure) {
                    ws.destroy();
                } else {
                    await new Promise<void>((resolve, reject) => {
                        ws.once("error", reject);
                        ws.end(() => resolve());
                    });
                }
            }
            if (failure) throw failure;
        },
    };
}

/** テスト用: ファイルに書かずメモリに溜める */
export function createMemoryEventsWriter(): EventsWriter & { records: EventRecord[] } {
    const records: EventRecord[] = [];
    return {
        records,
        write(obj: EventRecord) {
            records.push(obj);
        },
        async close() {
            // nothing to flush
        },
    };
}
