/**
 * Base class for domain errors.
 * Domain errors represent violated rules of the agenda, not I/O faults.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ TIME ERRORS ============

export class InvalidTimeOfDayError extends DomainError {
  readonly code = 'INVALID_TIME_OF_DAY';

  constructor(
    public readonly hour: number,
    public readonly minute: number,
  ) {
    super(`Time of day ${hour}:${minute} is outside 00:00-23:59`);
  }
}

// ============ ACTIVITY ERRORS ============

export class InvalidActivityNameError extends DomainError {
  readonly code = 'INVALID_ACTIVITY_NAME';

  constructor(
    public readonly activityName: string,
    public readonly maxLength: number,
  ) {
    super(
      `Activity name "${activityName}" must be between 1 and ${maxLength} characters`,
    );
  }
}

export class InvalidActivityWindowError extends DomainError {
  readonly code = 'INVALID_ACTIVITY_WINDOW';

  constructor(
    public readonly activityName: string,
    public readonly start: string,
    public readonly end: string,
  ) {
    super(
      `Activity "${activityName}" must start before it ends (got ${start}-${end})`,
    );
  }
}

// ============ SCHEDULE ERRORS ============

export class ScheduleLoadError extends DomainError {
  readonly code = 'SCHEDULE_LOAD_FAILED';

  constructor(
    public readonly source: string,
    public readonly reasons: string[],
  ) {
    super(`Could not load schedule from ${source}: ${reasons.join('; ')}`);
  }
}

// ============ RUNTIME ERRORS ============

export class ClockAlreadyRunningError extends DomainError {
  readonly code = 'CLOCK_ALREADY_RUNNING';

  constructor() {
    super('The clock accelerator has already been started');
  }
}

export class TerminalSetupError extends DomainError {
  readonly code = 'TERMINAL_SETUP_FAILED';

  constructor(reason: string) {
    super(`Could not switch the terminal to non-blocking input: ${reason}`);
  }
}

export class InputClosedError extends DomainError {
  readonly code = 'INPUT_CLOSED';

  constructor() {
    super('Input closed before a line was entered');
  }
}
