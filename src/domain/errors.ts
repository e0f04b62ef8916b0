export class WorklogError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The state file exists but cannot be read or does not describe a valid timer history. */
export class CorruptStateError extends WorklogError {
  constructor(
    readonly location: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Timer state in ${location} is corrupt: ${detail}. Run 'worklog reset' to start over.`, options);
  }
}

export class NoTimerDataError extends WorklogError {
  constructor() {
    super("No timers found to push. Start a timer or pass the hours with -t.");
  }
}

/** The attendance gateway rejected the request or could not be reached. */
export class RemoteSubmissionError extends WorklogError {
  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends WorklogError {}

export class UsageError extends WorklogError {
  override readonly exitCode = 2;
}
