export const EXAMPLE_ADDRESS = "foo@example.net";

export const Messages = {
  greeting: {
    _: (): string => {
      return "Simple Mail Transfer service ready";
    },
  },
  general: {
    ok: (): string => {
      return "OK";
    },
    empty_command: (): string => {
      return "Command must not be empty";
    },
    command_invalid: (): string => {
      return "Command not recognized";
    },
    not_started: (): string => {
      return "Session has not started yet.";
    },
  },
  helo: {
    already_started: (): string => {
      return "Session has started";
    },
    invalid_argument: (): string => {
      return "Invalid syntax (EHLO|HELO) domain";
    },
  },
  mail: {
    invalid_argument: (): string => {
      return `Invalid syntax MAIL FROM: <${EXAMPLE_ADDRESS}>`;
    },
  },
  rcpt: {
    invalid_argument: (): string => {
      return `Invalid syntax RCPT TO: <${EXAMPLE_ADDRESS}>`;
    },
  },
  vrfy: {
    disabled: (): string => {
      return "VRFY not supported";
    },
  },
  quit: {
    _: (): string => {
      return "Bye";
    },
  },
};
