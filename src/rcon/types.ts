export interface RCONConfig {
  host: string;
  port: number;
  password: string;
  timeoutMs: number;
  verbose?: boolean;
}

export const SERVERDATA_AUTH = 3;
export const SERVERDATA_AUTH_RESPONSE = 2;
export const SERVERDATA_EXECCOMMAND = 2;
export const SERVERDATA_RESPONSE_VALUE = 0;

// Auth replies carry this id when the password is rejected
export const AUTH_FAILED_ID = -1;

export interface Packet {
  id: number;
  type: number;
  body: string;
}

export type SessionState = "unconnected" | "connected" | "authenticated" | "closed";

// Code 2 means AUTH_RESPONSE while authenticating and EXECCOMMAND when sending,
// so incoming packets are classified by the phase they arrive in.
export type IncomingPacket =
  | { phase: "auth"; kind: "auth-response"; packet: Packet }
  | { phase: "auth"; kind: "ack"; packet: Packet }
  | { phase: "command"; kind: "response-value"; packet: Packet }
  | { phase: "command"; kind: "unexpected"; packet: Packet };

export type Phase = IncomingPacket["phase"];
