import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { delimiter, join } from "node:path";
import { buildSshArgs, findExecutable, keyFilePath, launchSsh } from "../shared/ssh";
import { LaunchError } from "../shared/errors";

const OPTS = {
  keyDir: "/home/test/.ssh/",
  user: "ec2-user",
  verbose: false,
};

describe("buildSshArgs", () => {
  it("builds key, user and host", () => {
    expect(
      buildSshArgs(
        {
          privateIp: "10.0.0.5",
          keyName: "deploy",
        },
        OPTS,
      ),
    ).toEqual([
      "-i",
      "/home/test/.ssh/deploy.pem",
      "-l",
      "ec2-user",
      "10.0.0.5",
    ]);
  });

  it("adds -v before the host and the remote command after it", () => {
    expect(
      buildSshArgs(
        {
          privateIp: "10.0.0.5",
          keyName: "deploy",
        },
        {
          ...OPTS,
          user: "ubuntu",
          verbose: true,
          remoteCommand: "uptime",
        },
      ),
    ).toEqual([
      "-i",
      "/home/test/.ssh/deploy.pem",
      "-l",
      "ubuntu",
      "-v",
      "10.0.0.5",
      "uptime",
    ]);
  });

  it("omits -i when the instance has no key pair", () => {
    expect(
      buildSshArgs(
        {
          privateIp: "10.0.0.5",
        },
        OPTS,
      ),
    ).toEqual([
      "-l",
      "ec2-user",
      "10.0.0.5",
    ]);
  });

  it("joins key paths with or without a trailing slash", () => {
    expect(keyFilePath("/keys", "prod")).toBe("/keys/prod.pem");
    expect(keyFilePath("/keys/", "prod")).toBe("/keys/prod.pem");
  });
});

describe("findExecutable", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ec2hop-path-"));
    mkdirSync(join(dir, "bin"));
    mkdirSync(join(dir, "other"));
  });

  afterEach(() => {
    rmSync(dir, {
      recursive: true,
      force: true,
    });
  });

  it("finds an executable file on PATH", () => {
    const bin = join(dir, "bin", "ssh");
    writeFileSync(bin, "#!/bin/sh\n");
    chmodSync(bin, 0o755);
    const pathEnv = [
      join(dir, "other"),
      join(dir, "bin"),
    ].join(delimiter);
    expect(findExecutable("ssh", pathEnv)).toBe(bin);
  });

  it("skips files that are not executable", () => {
    const bin = join(dir, "bin", "ssh");
    writeFileSync(bin, "#!/bin/sh\n");
    chmodSync(bin, 0o644);
    expect(findExecutable("ssh", join(dir, "bin"))).toBeNull();
  });

  it("skips empty and missing PATH entries", () => {
    const pathEnv = [
      "",
      join(dir, "missing"),
      join(dir, "other"),
    ].join(delimiter);
    expect(findExecutable("ssh", pathEnv)).toBeNull();
  });
});

describe("launchSsh", () => {
  const target = {
    privateIp: "10.0.0.5",
    keyName: "deploy",
  };

  it("hands stdin over and runs ssh with the built arguments", () => {
    const handoff = vi.fn();
    const run = vi.fn((_args: string[]) => 0);
    launchSsh(target, OPTS, () => {}, {
      locate: () => "/usr/bin/ssh",
      run,
      handoff,
    });
    expect(handoff).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith([
      "/usr/bin/ssh",
      "-i",
      "/home/test/.ssh/deploy.pem",
      "-l",
      "ec2-user",
      "10.0.0.5",
    ]);
  });

  it("fails when ssh is not on PATH", () => {
    const run = vi.fn((_args: string[]) => 0);
    expect(() =>
      launchSsh(target, OPTS, () => {}, {
        locate: () => null,
        run,
        handoff: () => {},
      }),
    ).toThrow("ssh: executable file not found in $PATH");
    expect(run).not.toHaveBeenCalled();
  });

  it("reports a non-zero exit with ssh's code", () => {
    let caught: unknown;
    try {
      launchSsh(target, OPTS, () => {}, {
        locate: () => "/usr/bin/ssh",
        run: () => 255,
        handoff: () => {},
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LaunchError);
    expect(caught).toHaveProperty("message", "ssh exited with code 255");
    expect(caught).toHaveProperty("exitCode", 255);
  });

  it("logs the key directory and the command line", () => {
    const debug = vi.fn();
    launchSsh(target, OPTS, debug, {
      locate: () => "/usr/bin/ssh",
      run: () => 0,
      handoff: () => {},
    });
    expect(debug.mock.calls).toEqual([
      [
        "key path is: /home/test/.ssh/",
      ],
      [
        "running command /usr/bin/ssh -i /home/test/.ssh/deploy.pem -l ec2-user 10.0.0.5",
      ],
    ]);
  });
});
