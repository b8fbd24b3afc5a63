// config.ts — Build the run configuration once, from flags, environment and an optional config file

import { readFileSync } from "node:fs";
import { join } from "node:path";
import * as v from "valibot";
import { parseJsonWith } from "@ec2hop/shared";
import type { ParsedArgs } from "./flags";
import { logWarn } from "./shared/ui";

export const DEFAULT_USER = "ec2-user";

const ConfigFileSchema = v.object({
  keyPath: v.optional(v.pipe(v.string(), v.minLength(1))),
  user: v.optional(v.pipe(v.string(), v.regex(/^[a-z_][a-z0-9_-]*$/i))),
  region: v.optional(v.pipe(v.string(), v.regex(/^[a-z]{2}(-[a-z]+)+-\d+$/))),
});

export type ConfigFile = v.InferOutput<typeof ConfigFileSchema>;

export interface RunConfig {
  verbose: boolean;
  list: boolean;
  /** Directory holding `<key pair name>.pem` files. */
  keyDir: string;
  user: string;
  region?: string;
  remoteCommand?: string;
}

type Env = Record<string, string | undefined>;

export function getConfigPath(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(env.HOME ?? "", ".config");
  return join(base, "ec2hop", "config.json");
}

/** Read the optional config file. Missing → empty; unreadable or invalid → empty with a warning. */
export function loadConfigFile(path: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    logWarn(`Ignoring unreadable config file ${path}`);
    return {};
  }
  const parsed = parseJsonWith(raw, ConfigFileSchema);
  if (!parsed) {
    logWarn(`Ignoring invalid config file ${path}`);
    return {};
  }
  return parsed;
}

/** Flag > environment > config file > default. */
export function resolveConfig(args: ParsedArgs, env: Env, file: ConfigFile): RunConfig {
  const keyDir = args.keyPath || env.AWS_KEY_PATH || file.keyPath || `${env.HOME ?? ""}/.ssh/`;
  const region = args.region || env.AWS_REGION || file.region;
  return {
    verbose: args.verbose,
    list: args.list,
    keyDir,
    user: args.user || env.EC2HOP_USER || file.user || DEFAULT_USER,
    ...(region
      ? {
          region,
        }
      : {}),
    ...(args.remoteCommand
      ? {
          remoteCommand: args.remoteCommand,
        }
      : {}),
  };
}
