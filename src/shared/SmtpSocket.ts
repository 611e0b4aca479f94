import net from "net";
import { Duplex } from "stream";
import winston from "winston";
import { LINE_SEPARATOR } from "./SmtpConstants";
import { SmtpChannelClosedError, SmtpChannelError } from "./SmtpError";
import { SmtpLineChannel } from "./SmtpLineChannel";
import { SmtpStream } from "../server/SmtpServerStream";

/**
 * Line channel over a socket, or any other duplex stream.
 */
export class SmtpSocket implements SmtpLineChannel {
  protected _stream: SmtpStream = new SmtpStream();
  protected _closed: boolean = false;
  protected _logger?: winston.Logger;

  /**
   * Constructs a new SmtpSocket.
   * @param socket the socket.
   * @param logger the logger.
   */
  public constructor(public readonly socket: Duplex, logger?: winston.Logger) {
    this._logger = logger;

    this.socket.on("close", () => this._event_close());
    this.socket.on("error", (err: Error) => this._event_error(err));
    this.socket.pipe(this._stream);
  }

  ////////////////////////////////////////////////
  // Getters
  ////////////////////////////////////////////////

  /**
   * Whether the channel is closed, by us or by the peer.
   */
  public get closed(): boolean {
    return this._closed;
  }

  /**
   * Gets the remote address, null if not a TCP socket.
   */
  public get address(): string | null {
    return this.socket instanceof net.Socket
      ? this.socket.remoteAddress ?? null
      : null;
  }

  /**
   * Gets the remote port, null if not a TCP socket.
   */
  public get port(): number | null {
    return this.socket instanceof net.Socket
      ? this.socket.remotePort ?? null
      : null;
  }

  /**
   * Gets the socket family, null if not a TCP socket.
   */
  public get family(): string | null {
    return this.socket instanceof net.Socket
      ? this.socket.remoteFamily ?? null
      : null;
  }

  ////////////////////////////////////////////////
  // Instance Methods
  ////////////////////////////////////////////////

  public read_line(): Promise<string> {
    return this._stream.read_line();
  }

  public read_dot_lines(): Promise<string[]> {
    return this._stream.read_dot_lines();
  }

  public write_lines(...lines: string[]): Promise<void> {
    if (this._closed) {
      return Promise.reject(
        new SmtpChannelClosedError("Cannot write to a closed channel.")
      );
    }

    const data: string = lines
      .map((line: string): string => line + LINE_SEPARATOR)
      .join("");

    return new Promise<void>((resolve, reject): void => {
      this.socket.write(data, (err?: Error | null): void => {
        if (err) {
          reject(new SmtpChannelError(err.message));
          return;
        }

        resolve();
      });
    });
  }

  public close(...farewell: string[]): void {
    if (this._closed) {
      return;
    }

    this._closed = true;
    this._stream.terminate(new SmtpChannelClosedError("Channel closed."), true);

    // Both directions go down once the farewell is flushed.
    const destroy = (): void => {
      this.socket.destroy();
    };

    if (farewell.length === 0) {
      this.socket.end(destroy);
      return;
    }

    this.socket.end(
      farewell.map((line: string): string => line + LINE_SEPARATOR).join(""),
      destroy
    );
  }

  ////////////////////////////////////////////////
  // Event Listeners
  ////////////////////////////////////////////////

  /**
   * Gets called when the socket was closed.
   */
  protected _event_close(): void {
    this._closed = true;
    this._stream.terminate(
      new SmtpChannelClosedError("Connection closed by peer.")
    );
  }

  /**
   * Gets called when an error occurred, the socket is of no use after it.
   * @param err the error.
   */
  protected _event_error(err: Error): void {
    this._logger?.warn(`Socket error: ${err.message}`);

    this._closed = true;
    this._stream.terminate(new SmtpChannelError(err.message), true);
    this.socket.destroy();
  }
}
