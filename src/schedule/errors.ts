/**
 * Error types raised by the schedule layer.
 */

export class CronParseError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'CronParseError';
  }
}

export class ScheduleLockError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
  ) {
    super(message);
    this.name = 'ScheduleLockError';
  }
}
