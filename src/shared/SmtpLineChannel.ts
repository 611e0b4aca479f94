/**
 * Line oriented view of one connection. Every read and write fails with an
 *  `SmtpChannelError` once the connection is gone.
 */
export interface SmtpLineChannel {
  readonly closed: boolean;

  /**
   * Reads one line, without its terminator.
   */
  read_line(): Promise<string>;

  /**
   * Reads lines up to a line holding a single dot, which is consumed but not
   *  returned.
   */
  read_dot_lines(): Promise<string[]>;

  /**
   * Writes every line followed by the line separator, in order.
   */
  write_lines(...lines: string[]): Promise<void>;

  /**
   * Closes the connection once, the farewell lines are written before the
   *  write side ends. Later calls do nothing.
   */
  close(...farewell: string[]): void;
}
