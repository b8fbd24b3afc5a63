/** CLI flag definitions and parsing — single source of truth for flag validation */

import { UsageError } from "./shared/errors";

export interface ParsedArgs {
  verbose: boolean;
  list: boolean;
  help: boolean;
  version: boolean;
  keyPath?: string;
  remoteCommand?: string;
  user?: string;
  region?: string;
  positionals: string[];
}

type BoolField = "verbose" | "list" | "help" | "version";
type ValueField = "keyPath" | "remoteCommand" | "user" | "region";

const BOOL_FLAGS = new Map<string, BoolField>([
  ["-v", "verbose"],
  ["--verbose", "verbose"],
  ["-l", "list"],
  ["--list", "list"],
  ["-h", "help"],
  ["--help", "help"],
  ["-V", "version"],
  ["--version", "version"],
]);

const VALUE_FLAGS = new Map<string, ValueField>([
  ["-p", "keyPath"],
  ["--key-path", "keyPath"],
  ["-c", "remoteCommand"],
  ["--command", "remoteCommand"],
  ["-u", "user"],
  ["--user", "user"],
  ["-r", "region"],
  ["--region", "region"],
]);

function isFlagLike(arg: string): boolean {
  return arg.startsWith("--") || (arg.startsWith("-") && arg.length > 1);
}

/** Expand --flag=value into --flag value so all flag parsing works uniformly */
export function expandEqualsFlags(args: string[]): string[] {
  const result: string[] = [];
  let rest = false;
  for (const arg of args) {
    if (!rest && arg.startsWith("--") && arg.includes("=")) {
      const eqIdx = arg.indexOf("=");
      result.push(arg.slice(0, eqIdx), arg.slice(eqIdx + 1));
    } else {
      rest ||= arg === "--";
      result.push(arg);
    }
  }
  return result;
}

/** Parse argv (without the node/script prefix). Flags may appear anywhere; "--" ends flag parsing. */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = expandEqualsFlags(argv);
  const parsed: ParsedArgs = {
    verbose: false,
    list: false,
    help: false,
    version: false,
    positionals: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--") {
      parsed.positionals.push(...args.slice(i + 1));
      break;
    }
    const boolField = BOOL_FLAGS.get(arg);
    if (boolField) {
      parsed[boolField] = true;
      continue;
    }
    const valueField = VALUE_FLAGS.get(arg);
    if (valueField) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new UsageError(`${arg} requires a value`);
      }
      parsed[valueField] = value;
      i++;
      continue;
    }
    if (isFlagLike(arg)) {
      throw new UsageError(`Unknown flag: ${arg}`);
    }
    parsed.positionals.push(arg.trim());
  }
  return parsed;
}

export function usage(program: string): string {
  return `Usage: ${program} [options] {instance id|private IPv4 address|name}

Options:
  -v, --verbose        be verbose (passes -v to the underlying ssh invocation)
  -p, --key-path DIR   directory holding <key pair>.pem files (default $AWS_KEY_PATH or ~/.ssh/)
  -u, --user NAME      remote login user (default ec2-user)
  -r, --region REGION  AWS region (default from the AWS SDK configuration)
  -l, --list           list running and pending instances
  -c, --command CMD    run a command on the remote server
  -h, --help           show this help
  -V, --version        show the version
`;
}
