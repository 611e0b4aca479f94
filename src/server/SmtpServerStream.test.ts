import { describe, expect, test } from "@jest/globals";
import { SmtpChannelClosedError } from "../shared/SmtpError";
import { SmtpStream } from "./SmtpServerStream";

describe("SmtpStream", () => {
  test("reads lines split over several chunks", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.write("EHLO te");
    stream.write("st\r\nNOOP\r\n");

    await expect(stream.read_line()).resolves.toBe("EHLO test");
    await expect(stream.read_line()).resolves.toBe("NOOP");
  });

  test("accepts a bare line feed as terminator", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.write("NOOP\nQUIT\r\n");

    await expect(stream.read_line()).resolves.toBe("NOOP");
    await expect(stream.read_line()).resolves.toBe("QUIT");
  });

  test("resolves a pending read once the line arrives", async () => {
    const stream: SmtpStream = new SmtpStream();
    const line: Promise<string> = stream.read_line();

    stream.write("NOOP\r\n");

    await expect(line).resolves.toBe("NOOP");
  });

  test("keeps multi byte characters split between chunks intact", async () => {
    const stream: SmtpStream = new SmtpStream();
    const data: Buffer = Buffer.from("Subject: é\r\n", "utf8");
    stream.write(data.subarray(0, data.length - 3));
    stream.write(data.subarray(data.length - 3));

    await expect(stream.read_line()).resolves.toBe("Subject: é");
  });

  test("allows only one read at a time", async () => {
    const stream: SmtpStream = new SmtpStream();
    const first: Promise<string> = stream.read_line();

    await expect(stream.read_line()).rejects.toThrow("A line is already being read.");

    stream.write("NOOP\r\n");
    await expect(first).resolves.toBe("NOOP");
  });

  test("reads a dot terminated block without the marker", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.write("Subject: hi\r\n\r\nline1\r\n\r\nline2\r\n.\r\nNOOP\r\n");

    await expect(stream.read_dot_lines()).resolves.toEqual([
      "Subject: hi",
      "",
      "line1",
      "",
      "line2",
    ]);
    await expect(stream.read_line()).resolves.toBe("NOOP");
  });

  test("removes the leading dot of escaped lines", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.write("..\r\n..leading\r\n.\r\n");

    await expect(stream.read_dot_lines()).resolves.toEqual([".", ".leading"]);
  });

  test("hands out buffered lines before failing at the end of input", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.write("NOOP\r\n");
    stream.end();

    await expect(stream.read_line()).resolves.toBe("NOOP");
    await expect(stream.read_line()).rejects.toBeInstanceOf(SmtpChannelClosedError);
  });

  test("fails a dot terminated read cut short by the end of input", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.write("Subject: hi\r\n\r\nbody\r\n");
    stream.end();

    await expect(stream.read_dot_lines()).rejects.toBeInstanceOf(SmtpChannelClosedError);
  });

  test("drops buffered lines when terminated with discard", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.write("NOOP\r\n");
    stream.terminate(new Error("gone"), true);

    await expect(stream.read_line()).rejects.toThrow("gone");
  });

  test("keeps the first termination error", async () => {
    const stream: SmtpStream = new SmtpStream();
    stream.terminate(new Error("first"));
    stream.terminate(new Error("second"));

    await expect(stream.read_line()).rejects.toThrow("first");
  });
});
