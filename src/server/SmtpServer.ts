import net from "net";
import { Duplex } from "stream";
import { EventEmitter } from "events";
import winston from "winston";
import { SmtpSocket } from "../shared/SmtpSocket";
import { DEFAULT_HOSTNAME, DEFAULT_PORT } from "../shared/SmtpConstants";
import { SmtpServerConfig } from "./SmtpServerConfig";
import { SmtpServerConnection } from "./SmtpServerConnection";
import { SmtpServerSession } from "./SmtpServerSession";

export declare interface SmtpServer {
  on(event: "server_listening", listener: () => void): this;
  on(event: "server_error", listener: (err: Error) => void): this;
  on(event: "server_close", listener: (err: Error | undefined) => void): this;
  on(
    event: "client_connected",
    listener: (connection: SmtpServerConnection) => void
  ): this;
  on(
    event: "client_disconnected",
    listener: (connection: SmtpServerConnection) => void
  ): this;
}

export class SmtpServer extends EventEmitter {
  protected plain_server: net.Server | null = null;
  protected _logger?: winston.Logger;

  /**
   * Constructs a new SmtpServer.
   * @param config the configuration.
   * @param hostname the hostname to listen on.
   * @param port the port to listen on.
   * @param backlog the backlog.
   * @param logger the logger, handed down to every connection.
   */
  public constructor(
    public readonly config: SmtpServerConfig,
    public readonly hostname: string = DEFAULT_HOSTNAME,
    public readonly port: number = DEFAULT_PORT,
    public readonly backlog: number = 500,
    logger?: winston.Logger
  ) {
    super();

    this._logger = logger;
  }

  /**
   * Runs the SmtpServer.
   * @returns ourselves.
   */
  public run(): SmtpServer {
    this.plain_server = net.createServer();

    this.plain_server.on("connection", (socket: net.Socket) =>
      this.accept(socket)
    );
    this.plain_server.on("error", (err: Error) => this._event_error(err));

    this.plain_server.listen(this.port, this.hostname, this.backlog, () =>
      this._event_listening()
    );

    return this;
  }

  /**
   * Closes the SmtpServer, open connections are left alone.
   * @returns ourselves.
   */
  public close(): SmtpServer {
    this.plain_server?.close((err: Error | undefined) =>
      this._event_close(err)
    );

    return this;
  }

  /**
   * Starts a session on the given connection, sessions share nothing.
   * @param socket the socket.
   * @returns the connection.
   */
  public accept(socket: Duplex): SmtpServerConnection {
    const smtp_socket: SmtpSocket = new SmtpSocket(socket, this._logger);
    const session: SmtpServerSession = new SmtpServerSession(
      this.config.domain
    );
    const connection: SmtpServerConnection = new SmtpServerConnection(
      this.config,
      smtp_socket,
      session,
      this._logger
    );

    connection.once("close", () => this.emit("client_disconnected", connection));
    connection.begin().catch((err: unknown) => {
      this._logger?.error(
        `Connection failed: ${err instanceof Error ? err.message : String(err)}`
      );
      this.emit("client_disconnected", connection);
    });

    this._logger?.info(
      `Client connected from ${smtp_socket.address ?? "unknown"}.`
    );
    this.emit("client_connected", connection);

    return connection;
  }

  /**
   * Gets called when an close event has been emitted.
   * @param err the possible error.
   */
  protected _event_close(err: Error | undefined): void {
    this._logger?.info("Server closed.");
    this.emit("server_close", err);
  }

  /**
   * Gets called when a listening event is emitted.
   */
  protected _event_listening(): void {
    this._logger?.info(`Listening on ${this.hostname}:${this.port}.`);
    this.emit("server_listening");
  }

  /**
   * Gets called when an error event is emitted.
   * @param err the error.
   */
  protected _event_error(err: Error): void {
    this._logger?.error(`Server error: ${err.message}`);
    this.emit("server_error", err);
  }
}
