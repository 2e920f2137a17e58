import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ReportArchive } from "./archive.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

describe("ReportArchive", () => {
  let tmpDir: string;
  let archive: ReportArchive;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "research-archive-test-"));
    archive = new ReportArchive(tmpDir);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("builds run prefixes from owner, schedule and run", () => {
    expect(archive.runPrefix("dev-user", "sched-1", "run-1")).toBe("dev-user/sched-1/run-1");
  });

  it("uses one-off for runs without a schedule", () => {
    expect(archive.runPrefix("dev-user", null, "run-1")).toBe("dev-user/one-off/run-1");
  });

  it("sanitizes path segments", () => {
    expect(archive.runPrefix("a/b", "..", "run 1")).toBe("a_b/_/run_1");
  });

  it("writes documents under the root, creating directories", async () => {
    await archive.write("dev-user/sched-1/run-1/report.md", "# Hello");

    const onDisk = join(tmpDir, "dev-user", "sched-1", "run-1", "report.md");
    expect(readFileSync(onDisk, "utf-8")).toBe("# Hello");
  });

  it("overwrites an existing document", async () => {
    await archive.write("u/s/r/report.md", "first");
    await archive.write("u/s/r/report.md", "second");

    const content = await archive.read("u/s/r/report.md");
    expect(content?.toString("utf-8")).toBe("second");
  });

  it("returns null when reading a missing document", async () => {
    expect(await archive.read("u/s/r/missing.md")).toBeNull();
  });

  it("rejects paths that escape the root", async () => {
    await expect(archive.write("../outside.md", "x")).rejects.toThrow("escapes the report archive");
  });

  it("removes every document and the run directory", async () => {
    await archive.write("u/s/r/report.md", "md");
    await archive.write("u/s/r/report.html", "<p>html</p>");

    const removed = await archive.remove({ md: "u/s/r/report.md", html: "u/s/r/report.html" });

    expect(removed).toBe(2);
    expect(existsSync(join(tmpDir, "u", "s", "r"))).toBe(false);
    expect(existsSync(join(tmpDir, "u", "s"))).toBe(true);
  });

  it("counts only documents that existed", async () => {
    await archive.write("u/s/r/report.md", "md");

    const removed = await archive.remove({ md: "u/s/r/report.md", pdf: "u/s/r/report.pdf" });

    expect(removed).toBe(1);
  });
});
