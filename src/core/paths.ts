import fs from "node:fs";
import path from "node:path";

export function ensureDir(p: string) {
    fs.mkdirSync(p, { recursive: true });
}

export function writeFileUtf8(p: string, text: string) {
    ensureDir(path.dirname(p));
    fs.writeFileSync(p, text, "utf8");
}

/** 隣の .tmp に書いてから rename する（読み手が途中状態を見ない） */
export function writeFileAtomic(p: string, text: string) {
    const tmp = `${p}.tmp`;
    writeFileUtf8(tmp, text);
    fs.renameSync(tmp, p);
}

export type DataPaths = {
    dataDir: string;
    stateFile: string;
    reportsDir: string;
    eventsFile: string;
};

export function dataPaths(dataDir: string): DataPaths {
    const base = path.resolve(dataDir);
    return {
        dataDir: base,
        stateFile: path.join(base, "orchestrator-state.json"),
        reportsDir: path.join(base, "reports"),
        eventsFile: path.join(base, "logs", "events.ndjson"),
    };
}

// 共有の state とは違い、レポートはセッションごとに別ファイル
export function reportPathFor(reportsDir: string, sessionId: string): string {
    return path.join(reportsDir, `synthesis-report-${sessionId}.md`);
}

export function ensureDataDirs(paths: DataPaths) {
    ensureDir(paths.dataDir);
    ensureDir(paths.reportsDir);
    ensureDir(path.dirname(paths.eventsFile));
}
