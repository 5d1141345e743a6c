import { type Server, type Socket, createServer } from "net";
import { PacketReader, encodePacket } from "./packet";
import {
  AUTH_FAILED_ID,
  type Packet,
  SERVERDATA_AUTH,
  SERVERDATA_AUTH_RESPONSE,
  SERVERDATA_RESPONSE_VALUE,
} from "./types";

// In-process RCON peer for tests. Binds 127.0.0.1 on an ephemeral port.

export interface TestServer {
  port: number;
  close(): Promise<void>;
}

export interface MockRCONServer extends TestServer {
  received: Packet[];
}

export interface MockServerOptions {
  password?: string;
  // Send an empty RESPONSE_VALUE ahead of the AUTH_RESPONSE
  ackBeforeAuth?: boolean;
  respond?: (command: string) => string;
}

const SERVER_READ_TIMEOUT_MS = 30_000;

export async function listen(onConnection: (socket: Socket) => void): Promise<TestServer> {
  const sockets = new Set<Socket>();
  const server: Server = createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", () => socket.destroy());
    onConnection(socket);
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Mock server has no TCP address");
  }

  return {
    port: address.port,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

/**
 * Accepts `password` (default "test") and answers every command with
 * `respond(body)`, by default `"OK: " + body`.
 */
export async function startMockServer(options: MockServerOptions = {}): Promise<MockRCONServer> {
  const password = options.password ?? "test";
  const respond = options.respond ?? ((command: string) => `OK: ${command}`);
  const received: Packet[] = [];

  const server = await listen((socket) => {
    const reader = new PacketReader(socket);

    const serve = async () => {
      for (;;) {
        const packet = await reader.readPacket(SERVER_READ_TIMEOUT_MS);
        received.push(packet);

        if (packet.type === SERVERDATA_AUTH) {
          if (options.ackBeforeAuth) {
            socket.write(encodePacket(packet.id, SERVERDATA_RESPONSE_VALUE, ""));
          }
          const id = packet.body === password ? packet.id : AUTH_FAILED_ID;
          socket.write(encodePacket(id, SERVERDATA_AUTH_RESPONSE, ""));
        } else {
          socket.write(encodePacket(packet.id, SERVERDATA_RESPONSE_VALUE, respond(packet.body)));
        }
      }
    };

    // The loop ends when the client disconnects
    serve().catch(() => socket.destroy());
  });

  return { ...server, received };
}
