import { EventEmitter } from "events";
import winston from "winston";
import { Messages } from "../language/Messages";
import { SmtpCommand } from "../shared/SmtpCommand";
import { SmtpChannelError, SmtpProtocolError } from "../shared/SmtpError";
import { SmtpResponse } from "../shared/SmtpResponse";
import { SmtpSocket } from "../shared/SmtpSocket";
import {
  COMMAND_HANDLERS,
  SmtpCommandContext,
  SmtpCommandOutcome,
} from "./SmtpServerCommands";
import { SmtpServerConfig } from "./SmtpServerConfig";
import { SmtpServerMail } from "./SmtpServerMail";
import { SmtpServerSession } from "./SmtpServerSession";

export enum SmtpServerConnectionState {
  AwaitingGreeting = "AWAITING_GREETING",
  Established = "ESTABLISHED",
  Closed = "CLOSED",
}

export declare interface SmtpServerConnection {
  on(event: "close", listener: (error: Error | null) => void): this;
  once(event: "close", listener: (error: Error | null) => void): this;
}

export class SmtpServerConnection
  extends EventEmitter
  implements SmtpCommandContext
{
  protected _logger?: winston.Logger;
  protected _finished: boolean = false;

  /**
   * Constructs a new SmtpServerConnection.
   * @param config the server config.
   * @param smtp_socket the socket.
   * @param session the session, one per connection.
   * @param logger the logger.
   */
  public constructor(
    public readonly config: SmtpServerConfig,
    public readonly smtp_socket: SmtpSocket,
    public readonly session: SmtpServerSession = new SmtpServerSession(
      config.domain
    ),
    logger?: winston.Logger
  ) {
    super();

    this._logger = logger;
  }

  /**
   * Gets the state of the connection.
   */
  public get state(): SmtpServerConnectionState {
    if (this._finished || this.smtp_socket.closed) {
      return SmtpServerConnectionState.Closed;
    }

    return this.session.has_started()
      ? SmtpServerConnectionState.Established
      : SmtpServerConnectionState.AwaitingGreeting;
  }

  /**
   * Greets the client and serves commands until QUIT or until the connection
   *  fails. Resolves in both cases, the socket is closed afterwards.
   */
  public async begin(): Promise<void> {
    try {
      await this._serve();
    } catch (e) {
      if (!(e instanceof SmtpChannelError)) {
        throw e;
      }

      this._logger?.warn(`Session aborted: ${e.message}`);
      this.emit("close", e);
      return;
    } finally {
      this._finished = true;
      this.smtp_socket.close();
    }

    await this._handle_mail();
    this.emit("close", null);
  }

  /**
   * Writes the given response lines.
   * @param lines the lines.
   */
  public async send(...lines: string[]): Promise<void> {
    for (const line of lines) {
      this._logger?.debug(`<< ${line}`);
    }

    await this.smtp_socket.write_lines(...lines);
  }

  public read_dot_lines(): Promise<string[]> {
    return this.smtp_socket.read_dot_lines();
  }

  public close(...farewell: string[]): void {
    for (const line of farewell) {
      this._logger?.debug(`<< ${line}`);
    }

    this.smtp_socket.close(...farewell);
  }

  /**
   * The command loop.
   */
  protected async _serve(): Promise<void> {
    await this.send(new SmtpResponse(220, Messages.greeting._()).encode());

    let outcome: SmtpCommandOutcome = SmtpCommandOutcome.Continue;
    while (outcome === SmtpCommandOutcome.Continue) {
      const line: string = await this.smtp_socket.read_line();
      this._logger?.debug(`>> ${line}`);

      outcome = await this._on_command(line);
    }
  }

  /**
   * Gets called for every line read in command mode.
   * @param line the line.
   * @returns whether to keep reading commands.
   */
  protected async _on_command(line: string): Promise<SmtpCommandOutcome> {
    try {
      const command: SmtpCommand = SmtpCommand.decode(line);
      return await COMMAND_HANDLERS[command.type](this, command);
    } catch (e) {
      if (!(e instanceof SmtpProtocolError)) {
        throw e;
      }

      await this.send(new SmtpResponse(e.status, e.message).encode());
      return SmtpCommandOutcome.Continue;
    }
  }

  /**
   * Hands the finished session to the mail callback.
   */
  protected async _handle_mail(): Promise<void> {
    const mail: SmtpServerMail = SmtpServerMail.from_session(this.session, {
      remote_address: this.smtp_socket.address,
      remote_family: this.smtp_socket.family,
      remote_port: this.smtp_socket.port,
      date: new Date(),
    });

    this._logger?.info(
      `Session finished, from <${mail.from}> to ${mail.to.length} recipient(s).`
    );

    try {
      await this.config.callbacks.handle_mail(mail, this);
    } catch (e) {
      this._logger?.error(
        `Mail handler failed: ${e instanceof Error ? e.message : String(e)}`
      );
    }
  }
}
