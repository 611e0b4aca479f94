import { describe, expect, test } from "@jest/globals";
import { MockSocket } from "../test/MockSocket";
import { SmtpServer } from "./SmtpServer";
import { SmtpServerConfig } from "./SmtpServerConfig";
import { SmtpServerConnection } from "./SmtpServerConnection";
import { SmtpServerMail } from "./SmtpServerMail";

function create_server(mails: SmtpServerMail[]): SmtpServer {
  return new SmtpServer(
    new SmtpServerConfig(
      {
        handle_mail: async (mail: SmtpServerMail): Promise<void> => {
          mails.push(mail);
        },
      },
      "capture.example.net"
    )
  );
}

describe("SmtpServer", () => {
  test("uses the local defaults", () => {
    const server: SmtpServer = create_server([]);

    expect(server.hostname).toBe("localhost");
    expect(server.port).toBe(1025);
  });

  test("runs one session per accepted socket", async () => {
    const mails: SmtpServerMail[] = [];
    const server: SmtpServer = create_server(mails);
    const connected: SmtpServerConnection[] = [];
    server.on("client_connected", (connection: SmtpServerConnection) =>
      connected.push(connection)
    );

    const first: MockSocket = new MockSocket();
    const second: MockSocket = new MockSocket();

    const disconnected: Promise<void> = new Promise<void>((resolve) => {
      let count: number = 0;
      server.on("client_disconnected", () => {
        if (++count === 2) {
          resolve();
        }
      });
    });

    const first_connection: SmtpServerConnection = server.accept(first);
    const second_connection: SmtpServerConnection = server.accept(second);

    first.feed("HELO one\r\nMAIL FROM:<one@example.net>\r\nQUIT\r\n");
    second.feed("HELO two\r\nMAIL FROM:<two@example.net>\r\nQUIT\r\n");

    await disconnected;

    expect(connected).toEqual([first_connection, second_connection]);
    expect(first_connection.session).not.toBe(second_connection.session);
    expect(first.lines[1]).toBe("250-capture.example.net");
    expect(mails.map((mail: SmtpServerMail) => mail.from).sort()).toEqual([
      "one@example.net",
      "two@example.net",
    ]);
  });
});
