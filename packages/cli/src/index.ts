#!/usr/bin/env tsx
import { basename } from "node:path";
import { createDescribeInstances, Ec2Inventory } from "./aws/aws";
import { cmdConnect, cmdList } from "./commands";
import { getConfigPath, loadConfigFile, resolveConfig } from "./config";
import { parseArgs, usage } from "./flags";
import { Ec2HopError, UsageError } from "./shared/errors";
import { createDebugLog, logError } from "./shared/ui";
import pkg from "../package.json" with { type: "json" };

const PROGRAM = basename(process.argv[1] ?? "ec2hop").replace(/\.[cm]?[jt]s$/, "");

function getErrorMessage(err: unknown): string {
  // Use duck typing instead of instanceof to avoid prototype chain issues
  return err && typeof err === "object" && "message" in err ? String(err.message) : String(err);
}

function handleError(err: unknown): never {
  logError(`Error: ${getErrorMessage(err)}`);
  if (err instanceof UsageError) {
    process.stderr.write(`\n${usage(PROGRAM)}`);
  }
  process.exit(err instanceof Ec2HopError ? err.exitCode : 1);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage(PROGRAM));
    return;
  }
  if (args.version) {
    console.log(pkg.version);
    return;
  }

  const config = resolveConfig(args, process.env, loadConfigFile(getConfigPath()));
  const debug = createDebugLog(config.verbose, PROGRAM);
  const deps = {
    inventory: new Ec2Inventory(
      createDescribeInstances({
        region: config.region,
      }),
      debug,
    ),
    io: {
      input: process.stdin,
      output: process.stdout,
    },
    debug,
  };

  if (args.positionals.length !== 1) {
    if (config.list) {
      await cmdList(deps);
      return;
    }
    process.stderr.write(usage(PROGRAM));
    process.exit(1);
  }

  await cmdConnect(args.positionals[0], config, deps);
}

main().catch(handleError);
