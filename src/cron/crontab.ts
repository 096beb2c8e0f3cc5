import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Precedes every entry this tool writes; entries without it belong to the user. */
export const MARKER = "#backtide entry, managed by `backtide check-config`:";

export interface CrontabRunner {
  read(): Promise<string[]>;
  write(lines: string[]): Promise<void>;
}

export function stripManagedEntries(lines: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() === MARKER) {
      i++; // the entry after the marker goes too
      continue;
    }
    out.push(lines[i]);
  }
  return out;
}

export function appendManagedEntries(lines: string[], entries: string[]): string[] {
  const out = [...lines];
  for (const entry of entries) out.push(MARKER, entry);
  return out;
}

function splitLines(text: string): string[] {
  const lines = text.split("\n");
  if (lines.length && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Talks to the `crontab` binary of the current user. */
export class SystemCrontab implements CrontabRunner {
  constructor(private readonly binary = "crontab") {}

  async read(): Promise<string[]> {
    try {
      const { stdout } = await execFileAsync(this.binary, ["-l"]);
      return splitLines(stdout);
    } catch (err) {
      // "no crontab for <user>" exits with 1
      if (err && typeof err === "object" && "code" in err && err.code === 1) return [];
      throw err;
    }
  }

  async write(lines: string[]): Promise<void> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "backtide-crontab-"));
    const file = path.join(dir, "crontab");
    try {
      fs.writeFileSync(file, lines.length ? `${lines.join("\n")}\n` : "", "utf8");
      await execFileAsync(this.binary, [file]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
}

export class CrontabService {
  constructor(private readonly runner: CrontabRunner = new SystemCrontab()) {}

  async managedEntries(): Promise<string[]> {
    const lines = await this.runner.read();
    return lines.filter((_, i) => i > 0 && lines[i - 1].trim() === MARKER);
  }

  /** Replaces all managed entries. Returns false when the crontab already matched. */
  async install(entries: string[]): Promise<boolean> {
    const current = await this.runner.read();
    const next = appendManagedEntries(stripManagedEntries(current), entries);
    if (next.length === current.length && next.every((line, i) => line === current[i])) return false;
    await this.runner.write(next);
    return true;
  }
}
