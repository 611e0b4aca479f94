import winston from "winston";

/**
 * Creates a console logger, every line tagged with the given label.
 * @param label the label.
 * @param level the lowest level written.
 * @returns the logger.
 */
export function create_logger(
  label: string,
  level: string = "info"
): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.label({ label }),
      winston.format.timestamp(),
      winston.format.printf(
        (info): string =>
          `${info.timestamp} (${info.level}@${info.label}) - ${info.message}`
      )
    ),
    transports: [new winston.transports.Console()],
  });
}
