// resolve/classify.ts — Decide which inventory dimension a lookup key refers to

import { isIP } from "node:net";

export type KeyKind = "ip-address" | "instance-id" | "name";

/** `i-` plus 8–17 hex digits, anchored at the end of the key only. */
export const INSTANCE_ID_RE = /i-[0-9a-fA-F]{8,17}$/;

/** Classify a lookup key. Total: anything unrecognised is looked up by Name tag. */
export function classifyKey(raw: string): KeyKind {
  // Zoned IPv6 (fe80::1%eth0) is not a private IP filter value
  if (!raw.includes("%") && isIP(raw) !== 0) {
    return "ip-address";
  }
  if (INSTANCE_ID_RE.test(raw)) {
    return "instance-id";
  }
  return "name";
}
