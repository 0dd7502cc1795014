/**
 * A command that does not match the grammar. `position` is the 0-based
 * offset of the failing token in the original message text.
 */
export class ParseError extends Error {
  constructor(
    readonly reason: string,
    readonly position: number,
    readonly token: string
  ) {
    super(`${reason} (at position ${position})`);
    this.name = 'ParseError';
  }
}

export class InvalidReminderIdError extends Error {
  constructor(readonly id: number) {
    super(`Invalid reminder ID: ${id}`);
    this.name = 'InvalidReminderIdError';
  }
}

export class UnknownTimezoneError extends Error {
  constructor(readonly timezone: string) {
    super(`Unknown timezone: ${timezone}`);
    this.name = 'UnknownTimezoneError';
  }
}
