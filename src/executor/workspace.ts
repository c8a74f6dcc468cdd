// src/executor/workspace.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { createLogger } from "../logger";

const log = createLogger("workspace");

function errnoCode(e: unknown): string | undefined {
    return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

function isFatalFsync(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

/**
 * tmp → fsync → rename. fsync failures other than ENOSPC/EIO are recorded in
 * `warnings` and the write proceeds.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: string;
    mode: number;
    warnings: string[];
}): void {
    const { filePath, content, mode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o755 });

    try {
        fs.writeFileSync(tmp, content, { mode: 0o600 });

        try {
            const fd = fs.openSync(tmp, "r+");
            try {
                fs.fdatasyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
        } catch (e: unknown) {
            const code = errnoCode(e);
            if (isFatalFsync(code)) throw e;
            warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${tmp}`);
        }

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);
    } catch (e) {
        if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
        throw e;
    }
}

/**
 * Directory the executor materializes artifacts into. Created on first
 * write; remove() deletes it recursively.
 */
export class Workspace {
    private dir: string | null = null;
    readonly warnings: string[] = [];

    constructor(private readonly configured: string = "", private readonly prefix: string = "intent") {}

    get path(): string | null {
        return this.dir;
    }

    ensure(): string {
        if (this.dir) return this.dir;
        if (this.configured) {
            fs.mkdirSync(this.configured, { recursive: true });
            this.dir = path.resolve(this.configured);
        } else {
            this.dir = fs.mkdtempSync(path.join(os.tmpdir(), `${this.prefix}-ws-`));
        }
        log.debug("Workspace ready", { dir: this.dir });
        return this.dir;
    }

    /** Write one artifact, returning its absolute path. */
    write(name: string, content: string, mode: number = 0o644): string {
        const filePath = path.join(this.ensure(), name);
        atomicWriteFileSync({ filePath, content, mode, warnings: this.warnings });
        return filePath;
    }

    remove(): boolean {
        if (!this.dir) return false;
        fs.rmSync(this.dir, { recursive: true, force: true });
        log.debug("Workspace removed", { dir: this.dir });
        this.dir = null;
        return true;
    }
}
