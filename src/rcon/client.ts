import { Socket } from "net";
import { validateRCONConfig } from "../config";
import {
  AuthenticationError,
  ConnectionClosedError,
  ConnectionError,
  ProtocolError,
  ProtocolStateError,
  TimeoutError,
} from "./errors";
import { PacketReader, classifyPacket, encodePacket } from "./packet";
import {
  AUTH_FAILED_ID,
  type Packet,
  type RCONConfig,
  SERVERDATA_AUTH,
  SERVERDATA_EXECCOMMAND,
  type SessionState,
} from "./types";

/**
 * One RCON session over one TCP connection.
 *
 * Callers sequence connect → authenticate → command… → close and await each
 * step; only one exchange may be in flight at a time. Failures are thrown to
 * the caller as-is, the client never retries.
 */
export class RCONClient {
  private socket: Socket | null = null;
  private reader: PacketReader | null = null;
  private currentState: SessionState = "unconnected";
  private requestId = 0;
  private busy = false;
  private readonly config: RCONConfig;

  constructor(config: RCONConfig) {
    validateRCONConfig(config);
    this.config = config;
  }

  get state(): SessionState {
    return this.currentState;
  }

  isConnected(): boolean {
    return this.currentState === "connected" || this.currentState === "authenticated";
  }

  async connect(): Promise<void> {
    if (this.currentState !== "unconnected") {
      throw new ProtocolStateError(`Cannot connect: session is ${this.currentState}`);
    }

    const { host, port, timeoutMs } = this.config;
    const socket = new Socket();
    this.socket = socket;
    this.reader = new PacketReader(socket);

    try {
      await new Promise<void>((resolve, reject) => {
        const cleanup = () => {
          socket.removeListener("connect", onConnect);
          socket.removeListener("error", onError);
          socket.removeListener("timeout", onTimeout);
          socket.removeListener("close", onClose);
          socket.setTimeout(0);
        };

        const onConnect = () => {
          cleanup();
          resolve();
        };

        const onError = (err: Error) => {
          cleanup();
          reject(new ConnectionError(`Cannot connect to RCON (${host}:${port}): ${err.message}`, { cause: err }));
        };

        const onTimeout = () => {
          cleanup();
          reject(new TimeoutError(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`, timeoutMs));
        };

        const onClose = () => {
          cleanup();
          reject(new ConnectionError("Connection closed before it was established"));
        };

        socket.once("connect", onConnect);
        socket.once("error", onError);
        socket.once("timeout", onTimeout);
        socket.once("close", onClose);
        socket.setTimeout(timeoutMs);
        socket.connect(port, host);
      });
    } catch (error) {
      this.close();
      throw error;
    }

    if (this.isClosed()) {
      socket.destroy();
      throw new ConnectionError("Connection closed before it was established");
    }
    this.currentState = "connected";
    this.log(`✅ RCON connected to ${host}:${port}`);
  }

  async authenticate(): Promise<void> {
    this.requireState("connected", "authenticate");

    await this.exclusive(async () => {
      await this.send(SERVERDATA_AUTH, this.config.password);

      // Some servers send an empty RESPONSE_VALUE before the real AUTH_RESPONSE
      let reply = classifyPacket("auth", await this.receive());
      if (reply.kind === "ack") {
        reply = classifyPacket("auth", await this.receive());
      }

      if (reply.packet.id === AUTH_FAILED_ID) {
        this.log("❌ RCON authentication rejected");
        throw new AuthenticationError("Authentication failed - invalid password");
      }
    });

    this.currentState = "authenticated";
    this.log("🔑 RCON authenticated");
  }

  /**
   * Runs one command and returns the body of the single reply packet.
   *
   * Neither the reply id nor fragmentation is checked: a response the server
   * splits across several packets comes back truncated to the first one.
   */
  async command(text: string, timeoutMs?: number): Promise<string> {
    this.requireState("authenticated", "send a command");

    return this.exclusive(async () => {
      const id = await this.send(SERVERDATA_EXECCOMMAND, text);
      this.log(`📤 [${id}] ${text}`);

      const reply = classifyPacket("command", await this.receive(timeoutMs));
      if (reply.kind === "unexpected") {
        this.log(`⚠️ [${id}] reply has packet type ${reply.packet.type}`);
      }
      this.log(`📥 [${reply.packet.id}] ${reply.packet.body.length} chars`);
      return reply.packet.body;
    });
  }

  close(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
      this.reader = null;
      this.log("👋 RCON connection closed");
    }
    this.currentState = "closed";
  }

  private isClosed(): boolean {
    return this.currentState === "closed";
  }

  private requireState(expected: SessionState, action: string): void {
    if (this.currentState !== expected) {
      throw new ProtocolStateError(`Cannot ${action}: session is ${this.currentState}, expected ${expected}`);
    }
  }

  // One exchange at a time; a dead stream closes the session before rethrowing
  private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new ProtocolStateError("Another RCON request is already in flight");
    }
    this.busy = true;
    try {
      return await operation();
    } catch (error) {
      if (
        error instanceof ConnectionClosedError ||
        error instanceof TimeoutError ||
        error instanceof ProtocolError
      ) {
        this.close();
      }
      throw error;
    } finally {
      this.busy = false;
    }
  }

  private async send(type: number, body: string): Promise<number> {
    const socket = this.socket;
    if (!socket) {
      throw new ProtocolStateError("Socket not initialized");
    }

    const id = ++this.requestId;
    const packet = encodePacket(id, type, body);

    await new Promise<void>((resolve, reject) => {
      socket.write(packet, (err) => {
        if (err) {
          reject(new ConnectionClosedError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });

    return id;
  }

  private receive(timeoutMs?: number): Promise<Packet> {
    if (!this.reader) {
      throw new ProtocolStateError("Socket not initialized");
    }
    return this.reader.readPacket(timeoutMs ?? this.config.timeoutMs);
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.error(message);
    }
  }
}
