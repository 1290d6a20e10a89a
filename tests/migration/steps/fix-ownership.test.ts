import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { fixOwnership } from "../../../src/migration/steps/fix-ownership.js";
import { createFakeHost } from "../../helpers/fake-host.js";
import { makeContext, runStep } from "../../helpers/context.js";
import { makeTmpHost, writeTree, type TmpHost } from "../../helpers/fixtures.js";

describe("fix-ownership", () => {
  let tmp: TmpHost;
  let newHome: string;

  beforeEach(() => {
    tmp = makeTmpHost();
    newHome = path.join(tmp.homeRoot, "agent1");
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("chowns the home and restores modes on secrets and the grant file", () => {
    writeTree(newHome, {
      ".openclaw/openclaw.json": "{}",
      ".openclaw/.env": "TOKEN=test-secret\n",
      ".openclaw/credentials/a.json": "{}",
    });
    writeTree(tmp.grantDir, { agent1: "agent1 ALL=(ALL) ALL\n" });
    const c = path.join(newHome, ".openclaw");
    const grant = path.join(tmp.grantDir, "agent1");
    const { ctx, executor } = makeContext(tmp, createFakeHost({ users: { agent1: newHome } }));

    expect(runStep(ctx, fixOwnership).status).toBe("done");
    expect(executor.journal).toEqual([
      `Set owner agent1 on ${newHome} (recursive)`,
      `Set mode 0600 on ${c}/openclaw.json`,
      `Set mode 0600 on ${c}/.env`,
      `Set mode 0700 on ${c}/credentials`,
      `Set mode 0600 on files under ${c}/credentials`,
      `Set owner root on ${grant}`,
      `Set mode 0440 on ${grant}`,
    ]);
    const mode = (p: string) => fs.statSync(p).mode & 0o777;
    expect(mode(path.join(c, "openclaw.json"))).toBe(0o600);
    expect(mode(path.join(c, "credentials"))).toBe(0o700);
    expect(mode(path.join(c, "credentials/a.json"))).toBe(0o600);
    expect(mode(grant)).toBe(0o440);
  });

  it("also chowns a workspace that lives outside the home", () => {
    const external = path.join(tmp.root, "srv/ws");
    fs.mkdirSync(external, { recursive: true });
    writeTree(newHome, { ".openclaw/openclaw.json": `{"workspace":"${external}"}` });
    const { ctx, executor } = makeContext(tmp, createFakeHost({ users: { agent1: newHome } }));

    runStep(ctx, fixOwnership);
    expect(executor.journal.slice(0, 2)).toEqual([
      `Set owner agent1 on ${newHome} (recursive)`,
      `Set owner agent1 on ${external} (recursive)`,
    ]);
  });

  it("leaves ownership alone without the account", () => {
    fs.mkdirSync(newHome);
    const { ctx, executor } = makeContext(tmp, createFakeHost());
    expect(runStep(ctx, fixOwnership).notes).toEqual(["account agent1 not found, ownership left unchanged"]);
    expect(executor.journal).toEqual([]);
  });
});
