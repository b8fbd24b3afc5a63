// resolve/select.ts — Interactive disambiguation when a lookup matches several instances

import type { Result } from "@ec2hop/shared";
import { Ok, Err } from "@ec2hop/shared";
import type { InstanceRecord } from "../inventory";
import { DataIntegrityError, InvalidSelectionError } from "../shared/errors";
import { readLine } from "../shared/ui";
import type { Candidate } from "./candidates";
import { formatCandidateTable, projectCandidates } from "./candidates";

export interface PromptIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export type Selection =
  | {
      status: "resolved";
      instance: InstanceRecord;
    }
  | {
      status: "cancelled";
    };

const INTEGER_RE = /^[+-]?\d+$/;

/**
 * Turn the prompt answer into a 1-based index.
 * Empty input picks the default (1); anything else must be an integer in [1, count].
 */
export function parseSelection(answer: string, count: number): Result<number> {
  const text = answer.trim();
  if (text === "") {
    return Ok(1);
  }
  if (!INTEGER_RE.test(text)) {
    return Err(new InvalidSelectionError(`Invalid selection '${text}': not a number`, text));
  }
  const idx = Number.parseInt(text, 10);
  if (idx < 1 || idx > count) {
    return Err(new InvalidSelectionError(`Invalid index ${text}`, text));
  }
  return Ok(idx);
}

export function buildSelectionPrompt(lookup: string, candidates: Candidate[]): string {
  return `Found more than one instance for '${lookup}'.

Available instances:

${formatCandidateTable(candidates)}

Which would you like to connect to? [1]
>>> `;
}

/** Map a chosen candidate back to the record it was projected from. */
export function findRecord(candidate: Candidate, records: InstanceRecord[]): InstanceRecord {
  const record = records.find((r) => r.InstanceId === candidate.id);
  if (!record) {
    throw new DataIntegrityError(`Unable to find instance ${candidate.id} (${candidate.displayName})`);
  }
  return record;
}

/**
 * Show the candidate table and ask which instance to use.
 *
 * End of input before a line is a clean cancel: a newline is written so the
 * terminal is not left mid-prompt. Bad answers throw InvalidSelectionError.
 */
export async function chooseInstance(lookup: string, records: InstanceRecord[], io: PromptIO): Promise<Selection> {
  const candidates = projectCandidates(records);
  io.output.write(buildSelectionPrompt(lookup, candidates));

  const answer = await readLine(io.input);
  if (answer === null) {
    io.output.write("\n");
    return {
      status: "cancelled",
    };
  }

  const parsed = parseSelection(answer, candidates.length);
  if (!parsed.ok) {
    throw parsed.error;
  }
  return {
    status: "resolved",
    instance: findRecord(candidates[parsed.data - 1], records),
  };
}
