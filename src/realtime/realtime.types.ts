import WebSocket from 'ws';

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
  Reconnecting = 'reconnecting',
  Failed = 'failed',
}

export interface ConnectionStatusEvent {
  state: ConnectionState;
  /** Reconnect attempt counter at the time of the transition. */
  attempt: number;
}

/** Event names the channel publishes on the application's EventEmitter2. */
export const REALTIME_EVENTS = {
  status: 'realtime.status',
  message: 'realtime.message',
  connected: 'realtime.connected',
} as const;

/** Inbound frame after decoding. */
export interface ServerMessage {
  type: string;
  data: unknown;
}

export type OutboundMessage = { type: string } & Record<string, unknown>;

/** The subset of a `ws` client socket the channel relies on. */
export interface RealtimeSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

/** Injection token for the function that opens sockets. */
export const SOCKET_FACTORY = Symbol('SOCKET_FACTORY');

export type SocketFactory = (url: string) => RealtimeSocket;

export const wsSocketFactory: SocketFactory = (url) => new WebSocket(url);
