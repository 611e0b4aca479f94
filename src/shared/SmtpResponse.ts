import { SEGMENT_SEPARATOR } from "./SmtpConstants";

export class SmtpResponse {
  public constructor(
    public readonly status: number,
    public readonly message: string
  ) {}

  /**
   * Encodes the response as a single line, without the line separator.
   * @returns the encoded response.
   */
  public encode(): string {
    return [this.status.toString(), this.message.trim()].join(
      SEGMENT_SEPARATOR
    );
  }
}
