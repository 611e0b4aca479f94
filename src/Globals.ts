import {
  DEFAULT_DOMAIN,
  DEFAULT_HOSTNAME,
  DEFAULT_PORT,
} from "./shared/SmtpConstants";

export class Globals {
  protected constructor(
    protected readonly _domain: string,
    protected readonly _hostname: string,
    protected readonly _port: number,
    protected readonly _log_level: string
  ) {}

  protected static _instance: Globals | undefined;

  /**
   * Gets the globals read from the process environment.
   */
  public static get instance(): Globals {
    if (!this._instance) {
      this._instance = Globals.from_env(process.env);
    }

    return this._instance;
  }

  /**
   * Reads the globals from the given environment.
   * @param env the environment.
   * @returns the globals.
   */
  public static from_env(env: NodeJS.ProcessEnv): Globals {
    let port: number = DEFAULT_PORT;
    if (env.SMTP_PORT !== undefined && env.SMTP_PORT !== "") {
      port = /^\d+$/.test(env.SMTP_PORT) ? Number(env.SMTP_PORT) : NaN;
      if (!(port >= 1 && port <= 65535)) {
        throw new Error(`Invalid SMTP_PORT '${env.SMTP_PORT}'.`);
      }
    }

    return new Globals(
      env.DOMAIN || DEFAULT_DOMAIN,
      env.SMTP_HOSTNAME || DEFAULT_HOSTNAME,
      port,
      env.LOG_LEVEL || "info"
    );
  }

  public get domain(): string {
    return this._domain;
  }

  public get hostname(): string {
    return this._hostname;
  }

  public get port(): number {
    return this._port;
  }

  public get log_level(): string {
    return this._log_level;
  }
}
