import { Messages } from "../language/Messages";
import { CAPABILITIES, SmtpCapability } from "../shared/SmtpCapability";
import { SmtpCommand, SmtpCommandType } from "../shared/SmtpCommand";
import { LINE_SEPARATOR } from "../shared/SmtpConstants";
import {
  SmtpBadSequenceError,
  SmtpCommandDisabled,
  SmtpSyntaxError,
} from "../shared/SmtpError";
import { SmtpMultipleLineResponse } from "../shared/SmtpMultipleLineResponse";
import { SmtpResponse } from "../shared/SmtpResponse";
import { SmtpServerSession } from "./SmtpServerSession";

const MAIL_COMMAND_PATTERN: RegExp = /^MAIL FROM: *<([^>]+)> *$/;
const RCPT_COMMAND_PATTERN: RegExp = /^RCPT TO: *<([^>]+)> *$/;

/**
 * What a handler may touch: the session, and the connection it came from.
 */
export interface SmtpCommandContext {
  readonly session: SmtpServerSession;

  send(...lines: string[]): Promise<void>;

  read_dot_lines(): Promise<string[]>;

  close(...farewell: string[]): void;
}

export enum SmtpCommandOutcome {
  Continue = "CONTINUE",
  Close = "CLOSE",
}

export type SmtpCommandHandler = (
  context: SmtpCommandContext,
  command: SmtpCommand
) => Promise<SmtpCommandOutcome>;

const OK: string = new SmtpResponse(250, Messages.general.ok()).encode();

/**
 * Extracts the address between the angle brackets.
 * @param pattern the pattern with the address as its only group.
 * @param line the full line.
 * @param usage the message to reject the line with.
 * @returns the address.
 */
function __path_parse(pattern: RegExp, line: string, usage: string): string {
  const match: RegExpExecArray | null = pattern.exec(line);
  if (match === null) {
    throw new SmtpSyntaxError(usage);
  }

  return match[1];
}

/**
 * Makes sure a HELO/EHLO exchange has happened.
 * @param session the session.
 */
function __assert_started(session: SmtpServerSession): void {
  if (!session.has_started()) {
    throw new SmtpBadSequenceError(Messages.general.not_started());
  }
}

/**
 * Handles both HELO and EHLO.
 */
async function handle_helo(
  context: SmtpCommandContext,
  command: SmtpCommand
): Promise<SmtpCommandOutcome> {
  const session: SmtpServerSession = context.session;

  if (session.has_started()) {
    throw new SmtpBadSequenceError(Messages.helo.already_started());
  }

  if (command.args === null) {
    throw new SmtpSyntaxError(Messages.helo.invalid_argument());
  }

  session.greeting_verb = command.type;
  session.client_name = command.args;

  await context.send(
    ...new SmtpMultipleLineResponse(250, [
      session.server_name,
      ...CAPABILITIES.map((capability: SmtpCapability): string =>
        capability.encode()
      ),
    ]).encode()
  );

  return SmtpCommandOutcome.Continue;
}

async function handle_mail(
  context: SmtpCommandContext,
  command: SmtpCommand
): Promise<SmtpCommandOutcome> {
  __assert_started(context.session);

  context.session.return_path = __path_parse(
    MAIL_COMMAND_PATTERN,
    command.line,
    Messages.mail.invalid_argument()
  );

  await context.send(OK);
  return SmtpCommandOutcome.Continue;
}

async function handle_rcpt(
  context: SmtpCommandContext,
  command: SmtpCommand
): Promise<SmtpCommandOutcome> {
  __assert_started(context.session);

  // A preceding MAIL is not required.
  context.session.recipients.push(
    __path_parse(
      RCPT_COMMAND_PATTERN,
      command.line,
      Messages.rcpt.invalid_argument()
    )
  );

  await context.send(OK);
  return SmtpCommandOutcome.Continue;
}

async function handle_rset(
  context: SmtpCommandContext
): Promise<SmtpCommandOutcome> {
  context.session.reset();

  await context.send(OK);
  return SmtpCommandOutcome.Continue;
}

async function handle_vrfy(): Promise<SmtpCommandOutcome> {
  throw new SmtpCommandDisabled(Messages.vrfy.disabled());
}

async function handle_noop(
  context: SmtpCommandContext
): Promise<SmtpCommandOutcome> {
  await context.send(OK);
  return SmtpCommandOutcome.Continue;
}

/**
 * Reads the message, the first blank line separates the headers from the body.
 */
async function handle_data(
  context: SmtpCommandContext
): Promise<SmtpCommandOutcome> {
  await context.send(OK);

  const lines: string[] = await context.read_dot_lines();

  const headers: string[] = [];
  const body: Buffer[] = [];
  let in_body: boolean = false;

  for (const line of lines) {
    if (!in_body && line.trim().length === 0) {
      in_body = true;
      continue;
    }

    if (in_body) {
      body.push(Buffer.from(line + LINE_SEPARATOR, "utf8"));
    } else {
      headers.push(line);
    }
  }

  context.session.headers = headers;
  context.session.body = Buffer.concat(body);

  return SmtpCommandOutcome.Continue;
}

async function handle_quit(
  context: SmtpCommandContext
): Promise<SmtpCommandOutcome> {
  context.close(new SmtpResponse(221, Messages.quit._()).encode());
  return SmtpCommandOutcome.Close;
}

/**
 * Verb to handler, shared by every connection.
 */
export const COMMAND_HANDLERS: Readonly<
  Record<SmtpCommandType, SmtpCommandHandler>
> = Object.freeze({
  [SmtpCommandType.Helo]: handle_helo,
  [SmtpCommandType.Ehlo]: handle_helo,
  [SmtpCommandType.Mail]: handle_mail,
  [SmtpCommandType.Rcpt]: handle_rcpt,
  [SmtpCommandType.Rset]: handle_rset,
  [SmtpCommandType.Vrfy]: handle_vrfy,
  [SmtpCommandType.Noop]: handle_noop,
  [SmtpCommandType.Quit]: handle_quit,
  [SmtpCommandType.Data]: handle_data,
});
