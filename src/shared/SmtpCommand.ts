import { SEGMENT_SEPARATOR } from "./SmtpConstants";
import { SmtpInvalidCommandError, SmtpSyntaxError } from "./SmtpError";
import { Messages } from "../language/Messages";

export enum SmtpCommandType {
  Helo = "HELO",
  Ehlo = "EHLO",
  Mail = "MAIL",
  Rcpt = "RCPT",
  Rset = "RSET",
  Vrfy = "VRFY",
  Noop = "NOOP",
  Quit = "QUIT",
  Data = "DATA",
}

export enum SmtpMailPrefix {
  From = "FROM",
}

export enum SmtpRcptPrefix {
  To = "TO",
}

const COMMAND_TYPES: ReadonlySet<string> = new Set<string>(
  Object.values(SmtpCommandType)
);

function is_command_type(raw: string): raw is SmtpCommandType {
  return COMMAND_TYPES.has(raw);
}

export class SmtpCommand {
  /**
   * Constructs a new command.
   * @param type the verb.
   * @param args the remainder of the trimmed line after the verb, if any.
   * @param line the line as received, handlers match against it.
   */
  public constructor(
    public readonly type: SmtpCommandType,
    public readonly args: string | null,
    public readonly line: string
  ) {}

  /**
   * Parses the given line. The verb is matched case sensitive.
   * @param raw the raw line, without the line separator.
   * @returns the parsed command.
   */
  public static decode(raw: string): SmtpCommand {
    const trimmed: string = raw.trim();
    if (trimmed.length === 0) {
      throw new SmtpSyntaxError(Messages.general.empty_command());
    }

    const split_index: number = trimmed.indexOf(SEGMENT_SEPARATOR);

    let raw_type: string = trimmed;
    let raw_args: string | null = null;

    if (split_index !== -1) {
      raw_type = trimmed.substring(0, split_index);
      raw_args = trimmed.substring(split_index + 1);
    }

    if (!is_command_type(raw_type)) {
      throw new SmtpInvalidCommandError(Messages.general.command_invalid());
    }

    return new SmtpCommand(raw_type, raw_args, raw);
  }
}
