import { LINE_SEPARATOR } from "../shared/SmtpConstants";
import { SmtpCommandType, SmtpMailPrefix, SmtpRcptPrefix } from "../shared/SmtpCommand";

/**
 * Envelope of one connection, owned by its SmtpServerConnection.
 */
export class SmtpServerSession {
  public greeting_verb: string = "";
  public client_name: string = "";
  public return_path: string = "";
  public recipients: string[] = [];
  public headers: string[] = [];
  public body: Buffer = Buffer.alloc(0);

  /**
   * Constructs a new session.
   * @param server_name the name we introduce ourselves with.
   */
  public constructor(public server_name: string = "") {}

  /**
   * Checks if a HELO/EHLO exchange has happened.
   * @returns if the session has started.
   */
  public has_started(): boolean {
    return this.greeting_verb.length > 0;
  }

  /**
   * Clears the envelope, the greeting survives.
   */
  public reset(): void {
    this.return_path = "";
    this.recipients = [];
    this.headers = [];
    this.body = Buffer.alloc(0);
  }

  /**
   * Renders the envelope as the commands that would submit it again.
   * @returns the rendered envelope.
   */
  public encode(): string {
    let result: string = `${SmtpCommandType.Mail} ${SmtpMailPrefix.From}: <${this.return_path}>${LINE_SEPARATOR}`;

    for (const recipient of this.recipients) {
      result += `${SmtpCommandType.Rcpt} ${SmtpRcptPrefix.To}: <${recipient}>${LINE_SEPARATOR}`;
    }

    result += `${SmtpCommandType.Data}${LINE_SEPARATOR}`;

    for (const header of this.headers) {
      result += `${header}${LINE_SEPARATOR}`;
    }

    result += LINE_SEPARATOR;
    result += this.body.toString("utf8");

    return result;
  }
}
