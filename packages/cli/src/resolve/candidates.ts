// resolve/candidates.ts — Project inventory records into sorted, display-ready candidates

import type { InstanceRecord } from "../inventory";
import { DataIntegrityError } from "../shared/errors";

export interface Candidate {
  displayName: string;
  id: string;
  privateIp: string;
}

export const NO_NAME = "[None]";

const COL_PADDING = 4;
const MIN_COL_WIDTH = 4;

/**
 * Query-escape a tag value: space becomes "+", everything outside
 * `A-Za-z0-9-_.~` is percent-encoded with upper-case hex.
 */
export function queryEscape(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, "+");
}

/** Display name for a record: its last `Name` tag, escaped, or "[None]". */
export function candidateName(record: InstanceRecord): string {
  let name = NO_NAME;
  for (const tag of record.Tags ?? []) {
    if (tag.Key === "Name") {
      name = queryEscape(tag.Value ?? "");
    }
  }
  return name;
}

function compareNames(a: Candidate, b: Candidate): number {
  if (a.displayName < b.displayName) {
    return -1;
  }
  if (a.displayName > b.displayName) {
    return 1;
  }
  return 0;
}

/** One candidate per record, ascending by display name. Throws DataIntegrityError on records missing an ID or private IP. */
export function projectCandidates(records: InstanceRecord[]): Candidate[] {
  const candidates = records.map((record): Candidate => {
    const displayName = candidateName(record);
    if (!record.InstanceId) {
      throw new DataIntegrityError(`Instance record '${displayName}' has no instance ID`);
    }
    if (!record.PrivateIpAddress) {
      throw new DataIntegrityError(`Instance ${record.InstanceId} has no private IP address`);
    }
    return {
      displayName,
      id: record.InstanceId,
      privateIp: record.PrivateIpAddress,
    };
  });
  return candidates.sort(compareNames);
}

// ── Tables ───────────────────────────────────────────────────────────────────

export function calculateColumnWidth(items: string[], minWidth: number): number {
  let maxWidth = minWidth;
  for (const item of items) {
    const width = item.length + COL_PADDING;
    if (width > maxWidth) {
      maxWidth = width;
    }
  }
  return maxWidth;
}

/** Left-aligned columns; every column but the last is padded to its widest cell plus four spaces. */
export function renderTable(rows: string[][]): string {
  const columnCount = Math.max(0, ...rows.map((r) => r.length));
  const widths: number[] = [];
  for (let col = 0; col < columnCount - 1; col++) {
    widths.push(
      calculateColumnWidth(
        rows.map((r) => r[col] ?? ""),
        MIN_COL_WIDTH,
      ),
    );
  }
  return rows
    .map((row) =>
      row
        .map((cell, col) => (col < row.length - 1 ? cell.padEnd(widths[col] ?? 0) : cell))
        .join(""),
    )
    .map((line) => `${line}\n`)
    .join("");
}

/** Numbered table shown by the selection prompt. */
export function formatCandidateTable(candidates: Candidate[]): string {
  return renderTable([
    [
      "n",
      "Name",
      "Instance ID",
      "Private IP",
    ],
    [
      "-",
      "----",
      "-----------",
      "----------",
    ],
    ...candidates.map((c, i) => [
      String(i + 1),
      c.displayName,
      c.id,
      c.privateIp,
    ]),
  ]);
}

/** Unnumbered table printed by `--list`. */
export function formatInstanceList(candidates: Candidate[]): string {
  return renderTable([
    [
      "Name",
      "Instance ID",
      "Private IP",
    ],
    [
      "----",
      "-----------",
      "----------",
    ],
    ...candidates.map((c) => [
      c.displayName,
      c.id,
      c.privateIp,
    ]),
  ]);
}
