import { SEGMENT_SEPARATOR } from "./SmtpConstants";

export const CONTINUATION_PREFIX: string = "-";

export class SmtpMultipleLineResponse {
  /**
   * Constructs a new multiple line response.
   * @param status the status shared by every line.
   * @param lines the line texts, at least one.
   */
  public constructor(
    public readonly status: number,
    public readonly lines: readonly string[]
  ) {
    if (lines.length === 0) {
      throw new Error("A multiple line response needs at least one line.");
    }
  }

  /**
   * Encodes the response, every line but the last one is marked as continued.
   * @returns the encoded lines, without line separators.
   */
  public encode(): string[] {
    return this.lines.map((line: string, i: number): string => {
      const separator: string =
        i + 1 < this.lines.length ? CONTINUATION_PREFIX : SEGMENT_SEPARATOR;
      return `${this.status}${separator}${line}`;
    });
  }
}
