// shared/ssh.ts — Locate ssh, build its argument vector, and hand the terminal over

import { spawnSync as nodeSpawnSync } from "node:child_process";
import { statSync } from "node:fs";
import { delimiter, join } from "node:path";
import { LaunchError } from "./errors";
import { prepareStdinForHandoff } from "./ui";
import type { DebugLog } from "./ui";

export interface SshTarget {
  privateIp: string;
  /** EC2 key pair name; the identity file is `<keyDir>/<keyName>.pem`. */
  keyName?: string;
}

export interface SshOptions {
  keyDir: string;
  user: string;
  verbose: boolean;
  remoteCommand?: string;
}

export function keyFilePath(keyDir: string, keyName: string): string {
  return join(keyDir, `${keyName}.pem`);
}

/** `-i <key> -l <user> [-v] <host> [command]` */
export function buildSshArgs(target: SshTarget, opts: SshOptions): string[] {
  const args: string[] = [];
  if (target.keyName) {
    args.push("-i", keyFilePath(opts.keyDir, target.keyName));
  }
  args.push("-l", opts.user);
  if (opts.verbose) {
    args.push("-v");
  }
  args.push(target.privateIp);
  if (opts.remoteCommand) {
    args.push(opts.remoteCommand);
  }
  return args;
}

/** Resolve `name` against PATH the way a shell would. Returns null when nothing executable is found. */
export function findExecutable(name: string, pathEnv: string = process.env.PATH ?? ""): string | null {
  for (const dir of pathEnv.split(delimiter)) {
    if (
      !dir ||
      !statSync(dir, {
        throwIfNoEntry: false,
      })?.isDirectory()
    ) {
      continue;
    }
    const candidate = join(dir, name);
    const stat = statSync(candidate, {
      throwIfNoEntry: false,
    });
    if (stat?.isFile() && (stat.mode & 0o111) !== 0) {
      return candidate;
    }
  }
  return null;
}

/**
 * Run a child process for an interactive terminal session using spawnSync.
 *
 * spawnSync blocks the event loop entirely, so the child process is the
 * sole reader of stdin, matching running ssh directly from a shell.
 */
export function spawnInteractive(args: string[], env?: Record<string, string | undefined>): number {
  const result = nodeSpawnSync(args[0], args.slice(1), {
    stdio: "inherit",
    env: env ?? process.env,
  });
  if (result.error) {
    throw new LaunchError(`Failed to start ${args[0]}: ${result.error.message}`, {
      cause: result.error,
    });
  }
  return result.status ?? 1;
}

export interface LaunchDeps {
  run: (args: string[]) => number;
  locate: (name: string) => string | null;
  handoff: () => void;
}

const defaultLaunchDeps: LaunchDeps = {
  run: spawnInteractive,
  locate: (name) => findExecutable(name),
  handoff: prepareStdinForHandoff,
};

/** Find ssh, run it against the target, and throw LaunchError on a non-zero exit. */
export function launchSsh(
  target: SshTarget,
  opts: SshOptions,
  debug: DebugLog,
  deps: LaunchDeps = defaultLaunchDeps,
): void {
  const binary = deps.locate("ssh");
  if (!binary) {
    throw new LaunchError("ssh: executable file not found in $PATH");
  }
  if (target.keyName) {
    debug(`key path is: ${opts.keyDir}`);
  }
  const argv = [
    binary,
    ...buildSshArgs(target, opts),
  ];
  debug(`running command ${argv.join(" ")}`);

  deps.handoff();
  const code = deps.run(argv);
  if (code !== 0) {
    throw new LaunchError(`ssh exited with code ${code}`, {
      exitCode: code,
    });
  }
}
