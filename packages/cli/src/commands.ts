import type { RunConfig } from "./config";
import type { InventoryClient } from "./inventory";
import { formatInstanceList, projectCandidates } from "./resolve/candidates";
import { buildListQuery } from "./resolve/query";
import { resolveInstance } from "./resolve/resolve";
import type { PromptIO } from "./resolve/select";
import { DataIntegrityError, Ec2HopError } from "./shared/errors";
import type { LaunchDeps } from "./shared/ssh";
import { launchSsh } from "./shared/ssh";
import type { DebugLog } from "./shared/ui";

export interface CommandDeps {
  inventory: InventoryClient;
  io: PromptIO;
  debug: DebugLog;
  /** Overrides for tests; production uses the real ssh lookup and spawn. */
  launch?: LaunchDeps;
}

// ── List ───────────────────────────────────────────────────────────────────────

/** Print every running or pending instance. An empty inventory is an error. */
export async function cmdList(deps: CommandDeps): Promise<void> {
  const records = await deps.inventory.describe(buildListQuery());
  const candidates = projectCandidates(records);
  if (candidates.length === 0) {
    throw new Ec2HopError("Found no instances");
  }
  deps.io.output.write(formatInstanceList(candidates));
}

// ── Connect ────────────────────────────────────────────────────────────────────

/**
 * Resolve `lookup` and open an ssh session to the chosen instance.
 * Returns without connecting when the selection prompt is cancelled.
 */
export async function cmdConnect(lookup: string, config: RunConfig, deps: CommandDeps): Promise<void> {
  const selection = await resolveInstance(lookup, deps);
  if (selection.status === "cancelled") {
    return;
  }

  const { instance } = selection;
  if (!instance.PrivateIpAddress) {
    throw new DataIntegrityError(`Instance ${instance.InstanceId ?? lookup} has no private IP address`);
  }
  launchSsh(
    {
      privateIp: instance.PrivateIpAddress,
      ...(instance.KeyName
        ? {
            keyName: instance.KeyName,
          }
        : {}),
    },
    {
      keyDir: config.keyDir,
      user: config.user,
      verbose: config.verbose,
      ...(config.remoteCommand
        ? {
            remoteCommand: config.remoteCommand,
          }
        : {}),
    },
    deps.debug,
    deps.launch,
  );
}
