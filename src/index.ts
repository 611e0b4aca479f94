import { Globals } from "./Globals";
import { create_logger } from "./helpers/Logger";
import { Messages } from "./language/Messages";
import { SmtpServer } from "./server/SmtpServer";
import {
  COMMAND_HANDLERS,
  SmtpCommandContext,
  SmtpCommandHandler,
  SmtpCommandOutcome,
} from "./server/SmtpServerCommands";
import {
  SmtpServerConfig,
  SmtpServerConfigCallbacks,
} from "./server/SmtpServerConfig";
import {
  SmtpServerConnection,
  SmtpServerConnectionState,
} from "./server/SmtpServerConnection";
import { SmtpServerMail, SmtpServerMailMeta } from "./server/SmtpServerMail";
import { SmtpServerSession } from "./server/SmtpServerSession";
import { SmtpStream } from "./server/SmtpServerStream";
import {
  CAPABILITIES,
  SmtpAuthType,
  SmtpCapability,
  SmtpCapabilityType,
} from "./shared/SmtpCapability";
import { SmtpCommand, SmtpCommandType } from "./shared/SmtpCommand";
import {
  SmtpBadSequenceError,
  SmtpChannelClosedError,
  SmtpChannelError,
  SmtpCommandDisabled,
  SmtpInvalidCommandError,
  SmtpProtocolError,
  SmtpSyntaxError,
} from "./shared/SmtpError";
import { SmtpLineChannel } from "./shared/SmtpLineChannel";
import { SmtpMultipleLineResponse } from "./shared/SmtpMultipleLineResponse";
import { SmtpResponse } from "./shared/SmtpResponse";
import { SmtpSocket } from "./shared/SmtpSocket";

export type {
  SmtpCommandContext,
  SmtpCommandHandler,
  SmtpServerConfigCallbacks,
  SmtpServerMailMeta,
  SmtpLineChannel,
};

export {
  Globals,
  create_logger,
  Messages,
  SmtpServer,
  COMMAND_HANDLERS,
  SmtpCommandOutcome,
  SmtpServerConfig,
  SmtpServerConnection,
  SmtpServerConnectionState,
  SmtpServerMail,
  SmtpServerSession,
  SmtpStream,
  CAPABILITIES,
  SmtpAuthType,
  SmtpCapability,
  SmtpCapabilityType,
  SmtpCommand,
  SmtpCommandType,
  SmtpBadSequenceError,
  SmtpChannelClosedError,
  SmtpChannelError,
  SmtpCommandDisabled,
  SmtpInvalidCommandError,
  SmtpProtocolError,
  SmtpSyntaxError,
  SmtpMultipleLineResponse,
  SmtpResponse,
  SmtpSocket,
};
