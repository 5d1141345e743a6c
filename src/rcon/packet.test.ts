import { PassThrough } from "stream";
import { describe, expect, test } from "vitest";
import { ConnectionClosedError, ProtocolError, TimeoutError } from "./errors";
import { PacketReader, classifyPacket, decodePacket, encodePacket } from "./packet";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("encodePacket", () => {
  test("lays out length, id, type, body and two null bytes", () => {
    expect(encodePacket(7, 2, "hi")).toEqual(
      Buffer.from([12, 0, 0, 0, 7, 0, 0, 0, 2, 0, 0, 0, 0x68, 0x69, 0, 0])
    );
  });

  test("empty body gives the minimum length of 10", () => {
    const packet = encodePacket(1, 3, "");
    expect(packet.length).toBe(14);
    expect(packet.readInt32LE(0)).toBe(10);
  });

  test("length counts UTF-8 bytes, not characters", () => {
    const packet = encodePacket(1, 2, "é");
    expect(packet.readInt32LE(0)).toBe(12);
  });

  test("negative ids are written as signed integers", () => {
    expect(encodePacket(-1, 2, "").readInt32LE(4)).toBe(-1);
  });
});

describe("decodePacket", () => {
  test.each<[number, number, string]>([
    [1, 3, "test"],
    [42, 0, ""],
    [-1, 2, ""],
    [2147483647, 0, "héllo wörld ✓"],
  ])("round-trips id=%i type=%i body=%j", (id, type, body) => {
    expect(decodePacket(encodePacket(id, type, body))).toEqual({ id, type, body });
  });

  test("rejects a frame shorter than its declared length", () => {
    const truncated = encodePacket(1, 0, "abc").subarray(0, 10);
    expect(() => decodePacket(truncated)).toThrow(ProtocolError);
  });

  test("rejects a declared length below 10", () => {
    const frame = Buffer.alloc(13);
    frame.writeInt32LE(5, 0);
    expect(() => decodePacket(frame)).toThrow(ProtocolError);
  });
});

describe("classifyPacket", () => {
  test("type 2 during auth is the auth response", () => {
    expect(classifyPacket("auth", { id: 1, type: 2, body: "" }).kind).toBe("auth-response");
  });

  test("type 0 during auth is the empty acknowledgement", () => {
    expect(classifyPacket("auth", { id: 1, type: 0, body: "" }).kind).toBe("ack");
  });

  test("type 0 during a command is the response value", () => {
    expect(classifyPacket("command", { id: 2, type: 0, body: "x" }).kind).toBe("response-value");
  });

  test("type 2 during a command is unexpected", () => {
    expect(classifyPacket("command", { id: 2, type: 2, body: "" }).kind).toBe("unexpected");
  });
});

describe("PacketReader", () => {
  test("reads a packet delivered in one chunk", async () => {
    const stream = new PassThrough();
    const reader = new PacketReader(stream);
    stream.write(encodePacket(5, 0, "hello"));

    await expect(reader.readPacket(1000)).resolves.toEqual({ id: 5, type: 0, body: "hello" });
  });

  test("reassembles a packet delivered one byte at a time", async () => {
    const stream = new PassThrough();
    const reader = new PacketReader(stream);
    const frame = encodePacket(9, 0, "split across segments");

    const pending = reader.readPacket(1000);
    for (const byte of frame) {
      stream.write(Buffer.from([byte]));
      await tick();
    }

    await expect(pending).resolves.toEqual({ id: 9, type: 0, body: "split across segments" });
  });

  test("separates packets that arrive in the same chunk", async () => {
    const stream = new PassThrough();
    const reader = new PacketReader(stream);
    stream.write(Buffer.concat([encodePacket(1, 0, ""), encodePacket(1, 2, "")]));

    await expect(reader.readPacket(1000)).resolves.toEqual({ id: 1, type: 0, body: "" });
    await expect(reader.readPacket(1000)).resolves.toEqual({ id: 1, type: 2, body: "" });
  });

  test("fails with ConnectionClosedError when the stream ends mid-packet", async () => {
    const stream = new PassThrough();
    const reader = new PacketReader(stream);
    stream.write(encodePacket(3, 0, "truncated body").subarray(0, 8));
    stream.end();

    await expect(reader.readPacket(1000)).rejects.toBeInstanceOf(ConnectionClosedError);
  });

  test("fails with ConnectionClosedError when the stream ends before any byte", async () => {
    const stream = new PassThrough();
    const reader = new PacketReader(stream);
    stream.end();

    await expect(reader.readPacket(1000)).rejects.toThrow(
      "Connection closed by server after 0 of 4 bytes"
    );
  });

  test("reports a stream error as a lost connection", async () => {
    const stream = new PassThrough();
    const reader = new PacketReader(stream);
    const pending = reader.readPacket(1000);
    stream.destroy(new Error("boom"));

    await expect(pending).rejects.toThrow("Connection lost: boom");
  });

  test("times out when no data arrives", async () => {
    const reader = new PacketReader(new PassThrough());

    const error = await reader.readPacket(20).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TimeoutError);
    if (error instanceof TimeoutError) {
      expect(error.timeoutMs).toBe(20);
      expect(error.message).toBe("Read timeout after 20ms");
    }
  });

  test("rejects an out-of-range length prefix", async () => {
    const stream = new PassThrough();
    const reader = new PacketReader(stream);
    const header = Buffer.alloc(4);
    header.writeInt32LE(-5, 0);
    stream.write(header);

    await expect(reader.readPacket(1000)).rejects.toBeInstanceOf(ProtocolError);
  });
});
