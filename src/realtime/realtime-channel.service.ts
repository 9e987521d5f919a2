import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import WebSocket from 'ws';
import { CREDENTIAL_STORE, CredentialStore } from '../credentials/credential-store.types';
import { buildRealtimeUrl, decodeServerMessage } from './message.util';
import {
  ConnectionState,
  ConnectionStatusEvent,
  OutboundMessage,
  REALTIME_EVENTS,
  RealtimeSocket,
  SOCKET_FACTORY,
  SocketFactory,
} from './realtime.types';

/** Thrown by {@link RealtimeChannelService.connect} when no access token is stored. */
export class MissingAccessTokenError extends Error {
  constructor() {
    super('No access token available for the real-time connection');
    this.name = 'MissingAccessTokenError';
  }
}

/**
 * Owns the single persistent WebSocket to the real-time endpoint.
 *
 * Drives the connection state machine, sends a `ping` frame on a fixed
 * heartbeat interval while connected and reconnects after a fixed delay up
 * to `MAX_RECONNECT_ATTEMPTS` times before giving up in the `failed` state.
 * Every transition is published as a `realtime.status` event; decoded
 * inbound frames are published as `realtime.message` events for
 * {@link TopicRouterService}. Socket failures are never thrown to callers.
 */
@Injectable()
export class RealtimeChannelService implements OnModuleDestroy {
  private readonly logger = new Logger(RealtimeChannelService.name);
  private readonly wsUrl: string;
  private readonly heartbeatIntervalMs: number;
  private readonly reconnectDelayMs: number;
  private readonly maxReconnectAttempts: number;

  private socket: RealtimeSocket | null = null;
  private settleAttempt: (() => void) | null = null;
  private pendingConnect: Promise<void> | null = null;
  private currentState = ConnectionState.Disconnected;
  private attempt = 0;
  private shouldReconnect = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private lastAck: Date | null = null;
  /** Bumped by disconnect() so a connect() still reading the token backs off. */
  private generation = 0;

  constructor(
    config: ConfigService,
    private readonly events: EventEmitter2,
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    @Inject(SOCKET_FACTORY) private readonly createSocket: SocketFactory,
  ) {
    this.wsUrl = config.get<string>('WS_URL', 'ws://localhost:8080/ws');
    // raw process.env values are strings
    this.heartbeatIntervalMs = Number(config.get<number>('HEARTBEAT_INTERVAL_MS', 30_000));
    this.reconnectDelayMs = Number(config.get<number>('RECONNECT_DELAY_MS', 5_000));
    this.maxReconnectAttempts = Number(config.get<number>('MAX_RECONNECT_ATTEMPTS', 5));
  }

  onModuleDestroy() {
    this.disconnect();
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.currentState === ConnectionState.Connected;
  }

  get reconnectAttempt(): number {
    return this.attempt;
  }

  /** When the server last answered a heartbeat with `pong`. */
  get lastHeartbeatAckAt(): Date | null {
    return this.lastAck;
  }

  /**
   * Open the connection if it is not already open or opening.
   *
   * Re-enables reconnection and resets the attempt counter, so this is also
   * the way out of `failed` and `disconnected`. Resolves once the socket
   * opened or the first attempt failed; later recovery happens in the
   * background and is only visible on the status stream.
   *
   * @throws {MissingAccessTokenError} if the credential store holds no access
   *         token. No state change happens in that case.
   */
  connect(): Promise<void> {
    if (this.currentState === ConnectionState.Connected) return Promise.resolve();
    if (this.pendingConnect) return this.pendingConnect;

    this.pendingConnect = this.startConnect().finally(() => {
      this.pendingConnect = null;
    });
    return this.pendingConnect;
  }

  /**
   * Close the connection and stop every timer. Safe from any state; no
   * reconnect or heartbeat fires afterwards until {@link connect} is called.
   */
  disconnect() {
    this.shouldReconnect = false;
    this.cancelReconnect();
    this.stopHeartbeat();
    this.generation++;
    this.dropSocket();
    this.finishAttempt();

    this.transition(ConnectionState.Disconnected);
  }

  /**
   * JSON-encode and send a frame. Outside the `connected` state the frame is
   * dropped silently.
   *
   * @returns whether the frame was written to the socket.
   */
  sendMessage(message: OutboundMessage): boolean {
    const socket = this.socket;
    if (this.currentState !== ConnectionState.Connected || !socket || socket.readyState !== WebSocket.OPEN) {
      return false;
    }
    try {
      socket.send(JSON.stringify(message));
      return true;
    } catch (err) {
      this.logger.error(`Failed to send ${message.type} frame: ${err}`);
      return false;
    }
  }

  private async startConnect(): Promise<void> {
    const generation = this.generation;
    const token = await this.credentials.getAccessToken();
    if (!token) {
      throw new MissingAccessTokenError();
    }
    // disconnect() was called while the token was being read
    if (generation !== this.generation || this.currentState === ConnectionState.Connected) return;

    this.shouldReconnect = true;
    this.cancelReconnect();
    this.attempt = 0;
    this.transition(ConnectionState.Connecting);
    await this.open(token);
  }

  /**
   * Open one socket and wire up its handlers. The returned promise settles
   * when the socket opens, fails, or is abandoned by {@link disconnect}.
   * Handlers of an abandoned socket are ignored.
   */
  private open(token: string): Promise<void> {
    this.dropSocket();
    this.finishAttempt();

    return new Promise<void>((resolve) => {
      this.settleAttempt = resolve;

      let socket: RealtimeSocket;
      try {
        socket = this.createSocket(buildRealtimeUrl(this.wsUrl, token));
      } catch (err) {
        this.logger.error(`Could not open real-time socket: ${err instanceof Error ? err.message : err}`);
        this.handleConnectionLoss();
        this.finishAttempt();
        return;
      }
      this.socket = socket;
      let opened = false;

      this.logger.log('Connecting to real-time endpoint…');

      socket.on('open', () => {
        if (socket !== this.socket) return;
        opened = true;
        this.logger.log('Real-time channel connected');
        this.attempt = 0;
        this.transition(ConnectionState.Connected);
        this.startHeartbeat();
        this.events.emit(REALTIME_EVENTS.connected);
        this.finishAttempt();
      });

      socket.on('message', (data: WebSocket.RawData) => {
        if (socket !== this.socket) return;
        this.handleMessage(data);
      });

      socket.on('close', (code: number, reason: Buffer) => {
        if (socket !== this.socket) return;
        this.socket = null;
        this.stopHeartbeat();
        if (opened) {
          this.logger.warn(`Real-time channel closed: ${code} ${reason.toString()}`);
        } else {
          this.logger.warn(`Real-time connection attempt failed: ${code} ${reason.toString()}`);
        }
        this.handleConnectionLoss();
        this.finishAttempt();
      });

      socket.on('error', (err: Error) => {
        this.logger.error(`Real-time socket error: ${err.message}`);
      });
    });
  }

  private handleMessage(data: WebSocket.RawData) {
    const msg = decodeServerMessage(data);
    if (!msg) {
      this.logger.error('Dropped undecodable real-time frame');
      return;
    }

    if (msg.type === 'pong') {
      this.lastAck = new Date();
      return;
    }

    this.events.emit(REALTIME_EVENTS.message, msg);
  }

  private handleConnectionLoss() {
    if (!this.shouldReconnect) {
      this.transition(ConnectionState.Disconnected);
      return;
    }
    this.scheduleReconnect();
  }

  /**
   * Schedule the next attempt after the fixed delay, or park the channel in
   * `failed` once the attempt budget is spent.
   */
  private scheduleReconnect() {
    if (this.attempt >= this.maxReconnectAttempts) {
      this.logger.error(`Giving up after ${this.attempt} reconnect attempts`);
      this.transition(ConnectionState.Failed);
      return;
    }

    this.attempt++;
    this.logger.log(`Reconnecting in ${this.reconnectDelayMs}ms (attempt ${this.attempt}/${this.maxReconnectAttempts})`);
    this.transition(ConnectionState.Reconnecting);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnect().catch((err) => {
        this.logger.error(`Reconnect attempt ${this.attempt} aborted: ${err}`);
        this.handleConnectionLoss();
      });
    }, this.reconnectDelayMs);
  }

  private async reconnect(): Promise<void> {
    const token = await this.credentials.getAccessToken();
    if (!this.shouldReconnect || this.currentState !== ConnectionState.Reconnecting) return;
    if (!token) {
      this.logger.warn('No access token available, reconnection stopped');
      this.shouldReconnect = false;
      // the skipped attempt is not charged against the budget
      this.attempt--;
      this.transition(ConnectionState.Disconnected);
      return;
    }
    await this.open(token);
  }

  private cancelReconnect() {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private startHeartbeat() {
    this.stopHeartbeat();
    this.heartbeatInterval = setInterval(() => {
      this.sendMessage({ type: 'ping' });
    }, this.heartbeatIntervalMs);
  }

  private stopHeartbeat() {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
  }

  /** Detach the current socket so its events are ignored, and close it. */
  private dropSocket() {
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.readyState === WebSocket.CLOSED || socket.readyState === WebSocket.CLOSING) return;
    try {
      socket.close(1000, 'client disconnect');
    } catch (err) {
      this.logger.warn(`Error closing real-time socket: ${err}`);
    }
  }

  private finishAttempt() {
    const settle = this.settleAttempt;
    this.settleAttempt = null;
    settle?.();
  }

  /** Every scheduled reconnect attempt is announced, even while already reconnecting. */
  private transition(next: ConnectionState) {
    if (next === this.currentState && next !== ConnectionState.Reconnecting) return;
    this.currentState = next;
    const event: ConnectionStatusEvent = { state: next, attempt: this.attempt };
    this.events.emit(REALTIME_EVENTS.status, event);
  }
}
