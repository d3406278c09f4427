// src/output_writer/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function errnoOf(e: unknown): string | undefined {
    if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") {
        return e.code;
    }
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

// warnings is required: callers decide whether fsync trouble is reportable
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, mode, fsyncMode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });

        try {
            const fd = fs.openSync(tmp, "r+");
            try {
                fs.fdatasyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
        } catch (e) {
            const code = errnoOf(e);
            if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
            warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${tmp}`);
        }

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        try {
            const dirFd = fs.openSync(dir, "r");
            try {
                fs.fsyncSync(dirFd);
            } finally {
                fs.closeSync(dirFd);
            }
        } catch (e) {
            const code = errnoOf(e);
            if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
            warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${dir}`);
        }
    } catch (e) {
        if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
        throw e;
    }
}
