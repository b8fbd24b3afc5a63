// shared/ui.ts — Logging, the selection prompt's line reader, and stdin handoff

import { createInterface } from "node:readline";
import pc from "picocolors";

export function logWarn(msg: string): void {
  process.stderr.write(`${pc.yellow(msg)}\n`);
}

export function logError(msg: string): void {
  process.stderr.write(`${pc.red(msg)}\n`);
}

export type DebugLog = (msg: string) => void;

/** Debug logger bound to the run's verbosity, prefixed with the program name. Silent unless `verbose` is set. */
export function createDebugLog(
  verbose: boolean,
  program: string,
  write: (line: string) => void = (line) => {
    process.stderr.write(line);
  },
): DebugLog {
  if (!verbose) {
    return () => {};
  }
  return (msg) => {
    write(`${pc.dim(`${program}: ${msg}`)}\n`);
  };
}

/**
 * Read a single line from `input`.
 * Resolves null when the stream ends before a line is produced; a final
 * unterminated line still counts as a line.
 */
export function readLine(input: NodeJS.ReadableStream): Promise<string | null> {
  const rl = createInterface({
    input,
    terminal: false,
  });
  return new Promise<string | null>((resolve) => {
    let answered = false;
    rl.once("line", (line) => {
      answered = true;
      resolve(line);
      rl.close();
    });
    rl.once("close", () => {
      if (!answered) {
        resolve(null);
      }
    });
  });
}

/** Prepare stdin for clean handoff to an interactive child process.
 *  Removes listeners and resets raw mode so fd 0 is clean.
 *
 *  NOTE: Do NOT call process.stdin.destroy() here — it can corrupt fd 0
 *  so the child process (SSH) inherits a broken file descriptor. */
export function prepareStdinForHandoff(): void {
  // readline leaves data/keypress listeners behind after the selection prompt
  process.stdin.removeAllListeners();

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }

  process.stdin.pause();
}
