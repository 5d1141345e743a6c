import type { Readable } from "stream";
import { ConnectionClosedError, ProtocolError, TimeoutError } from "./errors";
import {
  type IncomingPacket,
  type Packet,
  type Phase,
  SERVERDATA_AUTH_RESPONSE,
  SERVERDATA_RESPONSE_VALUE,
} from "./types";

// id + type + the two trailing null bytes
export const MIN_PACKET_LENGTH = 10;
export const MAX_PACKET_LENGTH = 1024 * 1024;

export function encodePacket(id: number, type: number, body: string): Buffer {
  const bodyBuffer = Buffer.from(body, "utf8");
  const length = bodyBuffer.length + MIN_PACKET_LENGTH;

  const packet = Buffer.alloc(length + 4);
  packet.writeInt32LE(length, 0);
  packet.writeInt32LE(id, 4);
  packet.writeInt32LE(type, 8);
  bodyBuffer.copy(packet, 12);
  packet.writeInt8(0, packet.length - 2);
  packet.writeInt8(0, packet.length - 1);

  return packet;
}

/**
 * Decodes one complete frame, length prefix included. The two terminator
 * bytes are dropped without being checked.
 */
export function decodePacket(frame: Buffer): Packet {
  if (frame.length < 4) {
    throw new ProtocolError(`Frame too short for a length prefix: ${frame.length} bytes`);
  }
  const length = frame.readInt32LE(0);
  assertPacketLength(length);
  if (frame.length < length + 4) {
    throw new ProtocolError(`Frame declares ${length} bytes but carries ${frame.length - 4}`);
  }

  return {
    id: frame.readInt32LE(4),
    type: frame.readInt32LE(8),
    body: frame.toString("utf8", 12, length + 4 - 2),
  };
}

export function classifyPacket(phase: Phase, packet: Packet): IncomingPacket {
  if (phase === "auth") {
    return packet.type === SERVERDATA_AUTH_RESPONSE
      ? { phase, kind: "auth-response", packet }
      : { phase, kind: "ack", packet };
  }
  return packet.type === SERVERDATA_RESPONSE_VALUE
    ? { phase, kind: "response-value", packet }
    : { phase, kind: "unexpected", packet };
}

function assertPacketLength(length: number): void {
  if (length < MIN_PACKET_LENGTH || length > MAX_PACKET_LENGTH) {
    throw new ProtocolError(
      `Invalid packet length ${length} (expected ${MIN_PACKET_LENGTH}..${MAX_PACKET_LENGTH})`,
    );
  }
}

/**
 * Buffers bytes from a stream and hands them out one packet at a time.
 * TCP delivers packets split or coalesced at arbitrary points, so reads
 * wait until the requested byte count is buffered.
 */
export class PacketReader {
  private buffer: Buffer = Buffer.alloc(0);
  private ended = false;
  private failure: Error | null = null;
  private notify: (() => void) | null = null;

  constructor(stream: Readable) {
    stream.on("data", (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.wake();
    });
    stream.on("end", () => {
      this.ended = true;
      this.wake();
    });
    stream.on("close", () => {
      this.ended = true;
      this.wake();
    });
    stream.on("error", (err: Error) => {
      this.failure = err;
      this.wake();
    });
  }

  async readPacket(timeoutMs: number): Promise<Packet> {
    const deadline = Date.now() + timeoutMs;
    const header = await this.readExactly(4, deadline, timeoutMs);
    const length = header.readInt32LE(0);
    assertPacketLength(length);
    const rest = await this.readExactly(length, deadline, timeoutMs);
    return decodePacket(Buffer.concat([header, rest]));
  }

  private async readExactly(count: number, deadline: number, timeoutMs: number): Promise<Buffer> {
    while (this.buffer.length < count) {
      if (this.failure) {
        throw new ConnectionClosedError(`Connection lost: ${this.failure.message}`, {
          cause: this.failure,
        });
      }
      if (this.ended) {
        throw new ConnectionClosedError(
          `Connection closed by server after ${this.buffer.length} of ${count} bytes`,
        );
      }
      await this.waitForData(deadline - Date.now(), timeoutMs);
    }

    const chunk = this.buffer.subarray(0, count);
    this.buffer = this.buffer.subarray(count);
    return chunk;
  }

  private waitForData(remainingMs: number, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      if (remainingMs <= 0) {
        reject(new TimeoutError(`Read timeout after ${timeoutMs}ms`, timeoutMs));
        return;
      }

      const timeout = setTimeout(() => {
        this.notify = null;
        reject(new TimeoutError(`Read timeout after ${timeoutMs}ms`, timeoutMs));
      }, remainingMs);

      this.notify = () => {
        clearTimeout(timeout);
        this.notify = null;
        resolve();
      };
    });
  }

  private wake(): void {
    this.notify?.();
  }
}
