import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import type { BlobPaths } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("report-archive");

function sanitizeSegment(segment: string): string {
  const cleaned = segment.replace(/[^a-zA-Z0-9._-]/g, "_");
  return cleaned === "." || cleaned === ".." || cleaned === "" ? "_" : cleaned;
}

/**
 * Filesystem object store for rendered report documents.
 *
 * Layout: {root}/{ownerId}/{scheduleId | "one-off"}/{runId}/report.{md,html,pdf}
 * Writes overwrite, so saving the same run twice leaves one set of files.
 */
export class ReportArchive {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  getRoot(): string {
    return this.root;
  }

  /** Relative directory for one run's documents. */
  runPrefix(ownerId: string, scheduleId: string | null, runId: string): string {
    return [ownerId, scheduleId ?? "one-off", runId].map(sanitizeSegment).join("/");
  }

  async write(relativePath: string, content: string | Buffer, signal?: AbortSignal): Promise<void> {
    const target = this.resolvePath(relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, { signal });
    log.debug({ path: relativePath, bytes: content.length }, "document written");
  }

  /** Read a document. Returns null when it does not exist. */
  async read(relativePath: string): Promise<Buffer | null> {
    try {
      return await readFile(this.resolvePath(relativePath));
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  /** Delete every document of a report and its run directory. Returns the number of files removed. */
  async remove(paths: BlobPaths): Promise<number> {
    let removed = 0;
    const dirs = new Set<string>();

    for (const relativePath of Object.values(paths)) {
      if (typeof relativePath !== "string") continue;
      const target = this.resolvePath(relativePath);
      dirs.add(dirname(target));
      if ((await this.read(relativePath)) !== null) {
        await rm(target, { force: true });
        removed++;
      }
    }

    for (const dir of dirs) {
      if (dir !== this.root) {
        await rm(dir, { recursive: true, force: true });
      }
    }

    log.debug({ paths, removed }, "documents removed");
    return removed;
  }

  private resolvePath(relativePath: string): string {
    const target = resolve(join(this.root, relativePath));
    if (target !== this.root && !target.startsWith(this.root + sep)) {
      throw new Error(`Path escapes the report archive: ${relativePath}`);
    }
    return target;
  }
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
