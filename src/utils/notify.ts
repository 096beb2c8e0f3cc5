import chalk from "chalk";

/** Where user-visible messages go. Every reported failure passes through `error`. */
export interface Notifier {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface ConsoleNotifierOptions {
  debug?: boolean;
  /** Prefix shown before each line, e.g. the profile being processed. */
  scope?: string;
}

export function createConsoleNotifier(opts: ConsoleNotifierOptions = {}): Notifier {
  const prefix = opts.scope ? `${chalk.cyan(`[${opts.scope}]`)} ` : "";
  return {
    error: (message) => console.error(`${prefix}${chalk.red(message)}`),
    warn: (message) => console.warn(`${prefix}${chalk.yellow(message)}`),
    info: (message) => console.log(`${prefix}${message}`),
    debug: (message) => {
      if (opts.debug) console.error(`${prefix}${chalk.gray(`[debug] ${message}`)}`);
    },
  };
}
