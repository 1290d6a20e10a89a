/**
 * Live host services backed by the standard Linux tools:
 * usermod/groupmod/getent/id, systemctl/loginctl, pgrep/pkill,
 * crontab, visudo, df/du and lsof.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { run, tryRun, succeeds, sleepSync } from "./command.js";
import type {
  AccountDatabase,
  DiskProbe,
  GrantValidator,
  HostIdentity,
  HostServices,
  ProcessTable,
  ScheduledTaskTable,
  ServiceManager,
  UnitScope,
} from "./types.js";

const POLL_INTERVAL_MS = 250;

function systemctlArgs(scope: UnitScope): string[] {
  return scope.kind === "user" ? ["--user", "-M", `${scope.user}@`] : [];
}

function createAccountDatabase(): AccountDatabase {
  function idOf(flag: "-u" | "-g", user: string): number | null {
    const res = tryRun("id", [flag, user]);
    if (res.status !== 0) return null;
    const n = parseInt(res.stdout.trim(), 10);
    return Number.isNaN(n) ? null : n;
  }

  return {
    userExists: (user) => succeeds("getent", ["passwd", user]),
    groupExists: (group) => succeeds("getent", ["group", group]),
    idsOf(user) {
      const uid = idOf("-u", user);
      const gid = idOf("-g", user);
      return uid === null || gid === null ? null : { uid, gid };
    },
    renameUser(oldUser, newUser) {
      run("usermod", ["-l", newUser, oldUser]);
    },
    renameGroup(oldGroup, newGroup) {
      run("groupmod", ["-n", newGroup, oldGroup]);
    },
    moveHome(user, newHome) {
      run("usermod", ["-d", newHome, "-m", user]);
    },
  };
}

function createServiceManager(): ServiceManager {
  return {
    isActive: (unit, scope) =>
      succeeds("systemctl", [...systemctlArgs(scope), "is-active", "--quiet", unit]),
    hasSession(user) {
      const res = tryRun("loginctl", ["show-user", user, "--property=State", "--value"]);
      return res.status === 0 && res.stdout.trim() !== "";
    },
    stop(unit, scope) {
      run("systemctl", [...systemctlArgs(scope), "stop", unit]);
    },
    disable(unit) {
      run("systemctl", ["disable", unit]);
    },
    daemonReload() {
      run("systemctl", ["daemon-reload"]);
    },
    terminateSession(user) {
      run("loginctl", ["terminate-user", user]);
    },
  };
}

function createProcessTable(): ProcessTable {
  const hasProcesses = (user: string) => succeeds("pgrep", ["-u", user]);

  return {
    hasProcesses,
    terminate(user, graceMs) {
      // pkill exits 1 when nothing matched; that is not a failure here
      tryRun("pkill", ["-TERM", "-u", user]);
      const deadline = Date.now() + graceMs;
      while (hasProcesses(user) && Date.now() < deadline) {
        sleepSync(Math.min(POLL_INTERVAL_MS, deadline - Date.now()));
      }
      if (hasProcesses(user)) {
        tryRun("pkill", ["-KILL", "-u", user]);
      }
    },
  };
}

function createScheduledTaskTable(): ScheduledTaskTable {
  return {
    read(user) {
      const res = tryRun("crontab", ["-u", user, "-l"]);
      return res.status === 0 ? res.stdout : null;
    },
    replace(user, content) {
      run("crontab", ["-u", user, "-"], { input: content });
    },
    remove(user) {
      run("crontab", ["-u", user, "-r"]);
    },
  };
}

function createGrantValidator(): GrantValidator {
  return {
    validate(content) {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "claw-migrate-grant-"));
      const file = path.join(dir, "grant");
      try {
        fs.writeFileSync(file, content, { mode: 0o440 });
        const res = tryRun("visudo", ["-c", "-f", file]);
        return { ok: res.status === 0, message: (res.stderr || res.stdout).trim() };
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    },
  };
}

function createDiskProbe(): DiskProbe {
  return {
    availableBytes(p) {
      const res = tryRun("df", ["-Pk", p]);
      if (res.status !== 0) return null;
      const fields = res.stdout.trim().split("\n")[1]?.split(/\s+/);
      const kb = fields ? parseInt(fields[3] ?? "", 10) : NaN;
      return Number.isNaN(kb) ? null : kb * 1024;
    },
    usageBytes(p) {
      const res = tryRun("du", ["-sk", p]);
      const kb = parseInt(res.stdout.split(/\s/)[0] ?? "", 10);
      // du exits 1 on unreadable entries but still prints a total
      return Number.isNaN(kb) ? null : kb * 1024;
    },
    openFileCount(p) {
      const res = tryRun("lsof", ["+D", p]);
      const lines = res.stdout.split("\n").filter((l) => l.trim() !== "");
      // first line is the header
      return Math.max(0, lines.length - 1);
    },
  };
}

function createHostIdentity(): HostIdentity {
  return {
    isRoot: () => process.getuid?.() === 0,
    invokingUsers() {
      const names = new Set<string>();
      names.add(os.userInfo().username);
      if (process.env.SUDO_USER) names.add(process.env.SUDO_USER);
      const login = tryRun("logname", []);
      if (login.status === 0 && login.stdout.trim()) names.add(login.stdout.trim());
      return [...names];
    },
    hostname: () => os.hostname(),
  };
}

export function createSystemHost(): HostServices {
  return {
    accounts: createAccountDatabase(),
    services: createServiceManager(),
    processes: createProcessTable(),
    schedule: createScheduledTaskTable(),
    grants: createGrantValidator(),
    disk: createDiskProbe(),
    identity: createHostIdentity(),
  };
}
