import { SmtpServerSession } from "./SmtpServerSession";

export interface SmtpServerMailMeta {
  remote_address: string | null;
  remote_family: string | null;
  remote_port: number | null;
  greeting_verb: string;
  client_name: string;
  date: Date;
}

/**
 * What a finished session hands to the consumer, detached from the session.
 */
export class SmtpServerMail {
  public constructor(
    public readonly contents: string,
    public readonly from: string,
    public readonly to: readonly string[],
    public readonly headers: readonly string[],
    public readonly body: Buffer,
    public readonly meta: SmtpServerMailMeta
  ) {}

  /**
   * Takes a snapshot of the given session.
   * @param session the session.
   * @param meta the connection details.
   * @returns the mail.
   */
  public static from_session(
    session: SmtpServerSession,
    meta: Omit<SmtpServerMailMeta, "greeting_verb" | "client_name">
  ): SmtpServerMail {
    return new SmtpServerMail(
      session.encode(),
      session.return_path,
      [...session.recipients],
      [...session.headers],
      Buffer.from(session.body),
      {
        ...meta,
        greeting_verb: session.greeting_verb,
        client_name: session.client_name,
      }
    );
  }
}
