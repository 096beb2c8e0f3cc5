export class BacktideError extends Error {
  code: string;
  exitCode: number;

  constructor(message: string, code = "ERR_BACKTIDE", exitCode = 1) {
    super(message);
    this.name = "BacktideError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

/** Config written by a release too old to upgrade from. Stops the process. */
export class ConfigVersionError extends BacktideError {
  constructor(readonly foundVersion: number, readonly minimumVersion: number) {
    super(
      `config.version is ${foundVersion}, but configs older than version ${minimumVersion} can no longer be upgraded`,
      "ERR_CONFIG_VERSION",
      2,
    );
    this.name = "ConfigVersionError";
  }
}

/** A single profile's schedule could not be set up; other profiles carry on. */
export class ScheduleError extends BacktideError {
  constructor(message: string, readonly profileId?: string) {
    super(message, "ERR_SCHEDULE", 1);
    this.name = "ScheduleError";
  }
}
