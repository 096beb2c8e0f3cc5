import os from "node:os";
import path from "node:path";
import { ScheduleError } from "../errors.js";

const UUID_RE = /^[A-Za-z0-9-]+$/;
// characters that would break out of the RUN key or the sh -c quoting
const FORBIDDEN_CMD = /["'\\\n]/;

export function udevRulesFileName(user = os.userInfo().username): string {
  return `99-backtide-${user}.rules`;
}

export function udevRulesPath(user?: string): string {
  return path.join("/etc/udev/rules.d", udevRulesFileName(user));
}

/**
 * Device-attach rules collected while the trigger set is built. Installing
 * the rendered file needs root and is left to the caller.
 */
export class UdevRules {
  private rules: string[] = [];

  constructor(private readonly shell = "/bin/sh") {}

  clean(): void {
    this.rules = [];
  }

  get isEmpty(): boolean {
    return this.rules.length === 0;
  }

  get count(): number {
    return this.rules.length;
  }

  addRule(command: string, uuid: string): string {
    if (!UUID_RE.test(uuid)) throw new ScheduleError(`Invalid device UUID "${uuid}"`);
    if (!command.trim()) throw new ScheduleError("Empty command for udev rule");
    if (FORBIDDEN_CMD.test(command)) throw new ScheduleError(`Udev rule command contains an invalid character: ${command}`);
    const rule = `ACTION=="add|change", ENV{ID_FS_UUID}=="${uuid}", RUN+="${this.shell} -c '${command}'"`;
    this.rules.push(rule);
    return rule;
  }

  render(): string {
    if (this.isEmpty) return "";
    return `# Written by backtide. Install with root permissions.\n${this.rules.join("\n")}\n`;
  }
}
