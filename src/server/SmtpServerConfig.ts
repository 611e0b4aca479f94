import type { SmtpServerConnection } from "./SmtpServerConnection";
import { SmtpServerMail } from "./SmtpServerMail";

export interface SmtpServerConfigCallbacks {
  /**
   * Receives the envelope of every session that ended with QUIT.
   */
  handle_mail: (
    mail: SmtpServerMail,
    connection: SmtpServerConnection
  ) => Promise<void>;
}

export class SmtpServerConfig {
  /**
   * Constructs a new server config.
   * @param callbacks the callbacks.
   * @param domain the server name sent in the greeting response.
   */
  public constructor(
    public readonly callbacks: SmtpServerConfigCallbacks,
    public readonly domain: string
  ) {}
}
