import { StringDecoder } from "string_decoder";
import { Writable, WritableOptions } from "stream";
import { DATA_END } from "../shared/SmtpConstants";
import { SmtpChannelClosedError } from "../shared/SmtpError";

interface SmtpStreamReader {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Splits the incoming bytes into lines, and hands them out one read at a time.
 */
export class SmtpStream extends Writable {
  protected _decoder: StringDecoder = new StringDecoder("utf8");
  protected _buffer: string = "";
  protected _lines: string[] = [];
  protected _reader: SmtpStreamReader | null = null;
  protected _error: Error | null = null;

  /**
   * Constructs a new SMTP stream.
   * @param options the options.
   */
  public constructor(options: WritableOptions = {}) {
    super(options);
  }

  /**
   * Handles a new chunk of data.
   * @param chunk the chunk of data.
   * @param encoding the encoding.
   * @param next the callback.
   */
  public _write(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    next: (error?: Error | null) => void
  ): void {
    // Nothing is read after termination.
    if (this._error !== null) {
      next();
      return;
    }

    this._buffer +=
      typeof chunk === "string" ? chunk : this._decoder.write(chunk);

    // A bare '\n' ends a line too, the '\r' before it is optional.
    let index: number;
    while ((index = this._buffer.indexOf("\n")) !== -1) {
      let line: string = this._buffer.substring(0, index);
      this._buffer = this._buffer.substring(index + 1);

      if (line.endsWith("\r")) {
        line = line.substring(0, line.length - 1);
      }

      this._lines.push(line);
    }

    this._deliver();
    next();
  }

  /**
   * Gets called once the writing side ended (the peer closed).
   * @param next the callback.
   */
  public _final(next: (error?: Error | null) => void): void {
    this.terminate(new SmtpChannelClosedError("Connection closed by peer."));
    next();
  }

  /**
   * Makes every read after the already buffered lines fail with the given error.
   * @param error the error.
   * @param discard drops the buffered lines as well.
   */
  public terminate(error: Error, discard: boolean = false): void {
    if (this._error === null) {
      this._error = error;
    }

    if (discard) {
      this._lines = [];
    }

    this._deliver();
  }

  /**
   * Reads one line.
   * @returns the line, without the line separator.
   */
  public read_line(): Promise<string> {
    if (this._reader !== null) {
      return Promise.reject(new Error("A line is already being read."));
    }

    return new Promise<string>((resolve, reject): void => {
      this._reader = { resolve, reject };
      this._deliver();
    });
  }

  /**
   * Reads lines until the data end marker, removing the leading dot of escaped lines.
   * @returns the lines, without the marker.
   */
  public async read_dot_lines(): Promise<string[]> {
    const lines: string[] = [];

    while (true) {
      const line: string = await this.read_line();
      if (line === DATA_END) {
        return lines;
      }

      lines.push(line.startsWith(DATA_END) ? line.substring(1) : line);
    }
  }

  /**
   * Settles the pending read, if there is anything to settle it with.
   */
  protected _deliver(): void {
    const reader: SmtpStreamReader | null = this._reader;
    if (reader === null) {
      return;
    }

    const line: string | undefined = this._lines.shift();
    if (line !== undefined) {
      this._reader = null;
      reader.resolve(line);
    } else if (this._error !== null) {
      this._reader = null;
      reader.reject(this._error);
    }
  }
}
