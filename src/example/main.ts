import { Globals } from "../Globals";
import { create_logger } from "../helpers/Logger";
import { SmtpServer } from "../server/SmtpServer";
import { SmtpServerConfig } from "../server/SmtpServerConfig";
import { SmtpServerMail } from "../server/SmtpServerMail";

const globals: Globals = Globals.instance;
const logger = create_logger("smtp", globals.log_level);

const config: SmtpServerConfig = new SmtpServerConfig(
  {
    handle_mail: async (mail: SmtpServerMail): Promise<void> => {
      logger.info(`Captured mail:\n${mail.contents}`);
    },
  },
  globals.domain
);

const server: SmtpServer = new SmtpServer(
  config,
  globals.hostname,
  globals.port,
  500,
  logger
).run();

const shutdown = (): void => {
  server.once("server_close", () => process.exit(0));
  server.close();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
