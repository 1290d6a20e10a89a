import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createExecutor, previewLine, stripPreview } from "../../src/exec/executor.js";
import { createFakeHost } from "../helpers/fake-host.js";
import { makeLogger, writeTree } from "../helpers/fixtures.js";

describe("preview lines", () => {
  it("round-trips a description", () => {
    expect(previewLine("Create directory /x")).toBe("[dry-run] Would create directory /x");
    expect(stripPreview("[dry-run] Would create directory /x")).toBe("Create directory /x");
    expect(stripPreview("Create directory /x")).toBe("Create directory /x");
  });
});

describe("createExecutor", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "claw-migrate-exec-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("describes without changing anything in dry-run mode", () => {
    const logger = makeLogger();
    const host = createFakeHost({ users: { bot: path.join(root, "bot") } });
    const exec = createExecutor({ dryRun: true, host, logger });
    const dir = path.join(root, "d");

    exec.perform({ kind: "mkdir", path: dir });
    exec.perform({ kind: "write", path: path.join(dir, "f"), content: "c" });
    exec.perform({ kind: "rename-user", from: "bot", to: "agent1" });

    expect(exec.journal).toEqual([`Create directory ${dir}`, `Write ${dir}/f`, "Rename user bot → agent1"]);
    expect(logger.info).toHaveBeenCalledWith(`[dry-run] Would create directory ${dir}`);
    expect(exec.view.fs.readFile(path.join(dir, "f"))).toBe("c");
    expect(exec.view.userExists("agent1")).toBe(true);
    expect(fs.existsSync(dir)).toBe(false);
    expect(host.calls).toEqual([]);
  });

  it("carries out actions in apply mode with the same journal", () => {
    const logger = makeLogger();
    const host = createFakeHost({ users: { bot: path.join(root, "bot") } });
    const exec = createExecutor({ dryRun: false, host, logger });
    const dir = path.join(root, "d");

    exec.perform({ kind: "mkdir", path: dir });
    exec.perform({ kind: "write", path: path.join(dir, "f"), content: "c" });
    exec.perform({ kind: "rename-user", from: "bot", to: "agent1" });

    expect(exec.journal).toEqual([`Create directory ${dir}`, `Write ${dir}/f`, "Rename user bot → agent1"]);
    expect(logger.info).toHaveBeenCalledWith(`Create directory ${dir}`);
    expect(fs.readFileSync(path.join(dir, "f"), "utf-8")).toBe("c");
    expect(host.calls).toEqual(["renameUser bot agent1"]);
    expect(exec.view.userExists("agent1")).toBe(true);
  });

  it("never overwrites on copy", () => {
    writeTree(root, { a: "a", b: "b" });
    const exec = createExecutor({ dryRun: false, host: createFakeHost(), logger: makeLogger() });
    expect(() => exec.perform({ kind: "copy", from: path.join(root, "a"), to: path.join(root, "b") })).toThrow();
    expect(fs.readFileSync(path.join(root, "b"), "utf-8")).toBe("b");
  });

  it("copies symlinks as links", () => {
    writeTree(root, { link: { link: "target" } });
    const exec = createExecutor({ dryRun: false, host: createFakeHost(), logger: makeLogger() });
    exec.perform({ kind: "copy", from: path.join(root, "link"), to: path.join(root, "link2") });
    expect(fs.readlinkSync(path.join(root, "link2"))).toBe("target");
  });

  it("sets the mode of every file below a directory", () => {
    writeTree(root, { "creds/a": "1", "creds/sub/b": "2" });
    fs.chmodSync(path.join(root, "creds"), 0o755);
    const exec = createExecutor({ dryRun: false, host: createFakeHost(), logger: makeLogger() });
    exec.perform({ kind: "chmod", path: path.join(root, "creds"), mode: 0o600, filesBelow: true });

    expect(fs.statSync(path.join(root, "creds/a")).mode & 0o777).toBe(0o600);
    expect(fs.statSync(path.join(root, "creds/sub/b")).mode & 0o777).toBe(0o600);
    expect(fs.statSync(path.join(root, "creds")).mode & 0o777).toBe(0o755);
  });

  it("moves directories and removes trees", () => {
    writeTree(root, { "src/x": "x" });
    const exec = createExecutor({ dryRun: false, host: createFakeHost(), logger: makeLogger() });
    exec.perform({ kind: "move", from: path.join(root, "src"), to: path.join(root, "dst") });
    expect(fs.readFileSync(path.join(root, "dst/x"), "utf-8")).toBe("x");
    exec.perform({ kind: "remove", path: path.join(root, "dst"), recursive: true });
    expect(fs.existsSync(path.join(root, "dst"))).toBe(false);
  });
});
