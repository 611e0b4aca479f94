import { describe, expect, test } from "@jest/globals";
import { SmtpCommand, SmtpCommandType } from "./SmtpCommand";
import { SmtpInvalidCommandError, SmtpSyntaxError } from "./SmtpError";

describe("SmtpCommand.decode", () => {
  test("splits the verb from its arguments at the first space", () => {
    const command: SmtpCommand = SmtpCommand.decode("MAIL FROM: <a@b.c>");

    expect(command.type).toBe(SmtpCommandType.Mail);
    expect(command.args).toBe("FROM: <a@b.c>");
    expect(command.line).toBe("MAIL FROM: <a@b.c>");
  });

  test("accepts a verb without arguments", () => {
    const command: SmtpCommand = SmtpCommand.decode("QUIT");

    expect(command.type).toBe(SmtpCommandType.Quit);
    expect(command.args).toBeNull();
  });

  test("trims the line before looking for the verb but keeps the raw line", () => {
    const command: SmtpCommand = SmtpCommand.decode("  NOOP  ");

    expect(command.type).toBe(SmtpCommandType.Noop);
    expect(command.args).toBeNull();
    expect(command.line).toBe("  NOOP  ");
  });

  test("keeps extra spaces after the verb in the arguments", () => {
    expect(SmtpCommand.decode("EHLO  client").args).toBe(" client");
  });

  test("rejects an empty line as a syntax error", () => {
    expect(() => SmtpCommand.decode("   ")).toThrow(SmtpSyntaxError);
    expect(() => SmtpCommand.decode("")).toThrow("Command must not be empty");
  });

  test("rejects unknown verbs", () => {
    expect(() => SmtpCommand.decode("FOO bar")).toThrow(SmtpInvalidCommandError);
    expect(() => SmtpCommand.decode("FOO bar")).toThrow("Command not recognized");
  });

  test("matches verbs case sensitive", () => {
    expect(() => SmtpCommand.decode("quit")).toThrow(SmtpInvalidCommandError);
  });
});
