// resolve/resolve.ts — Lookup key → exactly one instance record

import type { InventoryClient } from "../inventory";
import { NoMatchError } from "../shared/errors";
import type { DebugLog } from "../shared/ui";
import { projectCandidates } from "./candidates";
import { classifyKey } from "./classify";
import { buildQuery } from "./query";
import type { PromptIO, Selection } from "./select";
import { chooseInstance, findRecord } from "./select";

export interface ResolveDeps {
  inventory: InventoryClient;
  io: PromptIO;
  debug: DebugLog;
}

const KIND_LABELS = {
  "ip-address": "private IP address",
  "instance-id": "ID",
  name: "name",
} as const;

/**
 * Resolve `lookup` to a single running or pending instance.
 *
 * No match throws NoMatchError; a single match is returned without prompting;
 * several matches go through the selection prompt, which may be cancelled.
 */
export async function resolveInstance(lookup: string, deps: ResolveDeps): Promise<Selection> {
  const kind = classifyKey(lookup);
  deps.debug(`describing instance(s) by ${KIND_LABELS[kind]}`);

  const records = await deps.inventory.describe(buildQuery(lookup, kind));
  deps.debug(`got ${records.length} instance(s)`);

  if (records.length === 0) {
    throw new NoMatchError(lookup);
  }
  if (records.length === 1) {
    const [only] = projectCandidates(records);
    return {
      status: "resolved",
      instance: findRecord(only, records),
    };
  }
  return chooseInstance(lookup, records, deps.io);
}
