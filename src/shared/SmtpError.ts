/**
 * Base of every error that is answered with a single response line, after
 *  which the session continues in its current state.
 */
export class SmtpProtocolError extends Error {
  public readonly status: number = 550;

  public constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SmtpSyntaxError extends SmtpProtocolError {}

export class SmtpInvalidCommandError extends SmtpProtocolError {}

export class SmtpBadSequenceError extends SmtpProtocolError {}

export class SmtpCommandDisabled extends SmtpProtocolError {}

/**
 * Failure of the underlying connection, fatal to the session.
 */
export class SmtpChannelError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SmtpChannelClosedError extends SmtpChannelError {}
