import { DEFAULT_PROFILE_ID } from "../config/store.js";

export const JOB_SUBCOMMAND = "backup-job";

export interface JobCommandOptions {
  executable: string;
  profileId: string;
  /** Only set when the config file is not at its default location. */
  configPath?: string | null;
  debug?: boolean;
  subcommand?: string;
  redirectStdout?: boolean;
  redirectStderr?: boolean;
  /** Resolved `nice` binary, or null when disabled or unavailable. */
  nice?: string | null;
  /** Resolved `ionice` binary, or null when disabled or unavailable. */
  ionice?: string | null;
}

const SAFE_WORD = /^[\w@%+=:,./-]+$/;

export function shellQuote(arg: string): string {
  if (arg.length && SAFE_WORD.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Argument vector for spawning the job directly. Redirections have no token form and are left out. */
export function compileAsTokens(opts: JobCommandOptions): string[] {
  const tokens: string[] = [];
  if (opts.nice) tokens.push(opts.nice, "-n19");
  // IO priority: best effort class, lowest level
  if (opts.ionice) tokens.push(opts.ionice, "-c2", "-n7");
  tokens.push(opts.executable);
  if (opts.profileId !== DEFAULT_PROFILE_ID) tokens.push("--profile-id", opts.profileId);
  if (opts.configPath) tokens.push("--config", opts.configPath);
  if (opts.debug) tokens.push("--debug");
  tokens.push(opts.subcommand ?? JOB_SUBCOMMAND);
  return tokens;
}

/** Shell text for a crontab line or a udev RUN key. */
export function compileAsShellString(opts: JobCommandOptions): string {
  let cmd = compileAsTokens(opts).map(shellQuote).join(" ");
  if (opts.redirectStdout) cmd += " >/dev/null";
  if (opts.redirectStderr) cmd += opts.redirectStdout ? " 2>&1" : " 2>/dev/null";
  return cmd;
}
