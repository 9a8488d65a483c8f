/**
 * sway IPC client
 *
 * Uses two connections: one for commands, whose replies arrive in request
 * order, and one subscribed to output, shutdown and cursor_warp events.
 */

import * as net from 'net';
import { BridgeError, BridgeErrorCode } from '../types/BridgeState';
import {
  SUBSCRIBED_EVENTS,
  SwayEventType,
  SwayMessage,
  SwayMessageReader,
  SwayMessageType,
  cursorWarpSchema,
  encodeMessage,
  isEventType,
  outputsReplySchema,
  subscribeReplySchema,
} from './SwayIpcProtocol';
import {
  LayoutOutput,
  WindowManagerEvent,
  WindowManagerEventType,
  WindowManagerIpc,
} from './WindowManagerIpc';

interface PendingReply {
  resolve: (message: SwayMessage) => void;
  reject: (error: Error) => void;
}

export class SwayIpcClient implements WindowManagerIpc {
  private commandSocket: net.Socket | null = null;
  private eventSocket: net.Socket | null = null;
  private readonly commandReader = new SwayMessageReader();
  private readonly eventReader = new SwayMessageReader();
  private readonly pendingReplies: PendingReply[] = [];
  private subscribeReply: PendingReply | null = null;
  private _connected = false;
  private closing = false;

  onEvent?: (event: WindowManagerEvent) => void;
  onError?: (message: string) => void;

  constructor(private readonly socketPath: string) {}

  get connected(): boolean {
    return this._connected;
  }

  async connect(): Promise<void> {
    try {
      this.commandSocket = await this.openSocket('command', (chunk) =>
        this.handleCommandData(chunk)
      );
      this.eventSocket = await this.openSocket('event', (chunk) => this.handleEventData(chunk));
      await this.subscribe(this.eventSocket);
    } catch (error) {
      this.destroySockets();
      if (error instanceof BridgeError && error.code === BridgeErrorCode.CONNECT_FAILED) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BridgeError(
        BridgeErrorCode.CONNECT_FAILED,
        `Failed to connect to sway IPC at ${this.socketPath}: ${message}`
      );
    }

    this._connected = true;
    console.log(`[SwayIpcClient] Connected to ${this.socketPath}`);
  }

  async getOutputs(): Promise<LayoutOutput[]> {
    const reply = await this.request(SwayMessageType.GET_OUTPUTS);
    const parsed = outputsReplySchema.safeParse(parseJson(reply.payload));
    if (!parsed.success) {
      throw new BridgeError(BridgeErrorCode.PROTOCOL_ERROR, 'Malformed GET_OUTPUTS reply');
    }
    return parsed.data.map((output) => ({ name: output.name, rect: output.rect }));
  }

  disconnect(): void {
    if (!this.commandSocket && !this.eventSocket) {
      return;
    }
    this.closing = true;
    this._connected = false;
    this.rejectPending('sway IPC disconnected');
    this.commandSocket?.end();
    this.eventSocket?.end();
    this.commandSocket = null;
    this.eventSocket = null;
    console.log('[SwayIpcClient] Disconnected');
  }

  private openSocket(role: string, onData: (chunk: Buffer) => void): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(this.socketPath);
      let settled = false;

      socket.on('connect', () => {
        settled = true;
        resolve(socket);
      });

      socket.on('data', (chunk: Buffer) => {
        try {
          onData(chunk);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.handleFailure(`sway IPC ${role} stream error: ${message}`);
        }
      });

      socket.on('error', (err: Error) => {
        if (!settled) {
          settled = true;
          reject(err);
          return;
        }
        this.handleFailure(`sway IPC ${role} connection error: ${err.message}`);
      });

      socket.on('close', () => {
        if (settled) {
          this.handleFailure(`sway IPC ${role} connection closed`);
        }
      });
    });
  }

  private subscribe(socket: net.Socket): Promise<void> {
    return new Promise<SwayMessage>((resolve, reject) => {
      this.subscribeReply = { resolve, reject };
      socket.write(encodeMessage(SwayMessageType.SUBSCRIBE, JSON.stringify(SUBSCRIBED_EVENTS)));
    }).then((reply) => {
      const parsed = subscribeReplySchema.safeParse(parseJson(reply.payload));
      if (!parsed.success || !parsed.data.success) {
        throw new BridgeError(
          BridgeErrorCode.CONNECT_FAILED,
          'sway IPC rejected the subscription'
        );
      }
    });
  }

  private request(type: SwayMessageType, payload = ''): Promise<SwayMessage> {
    const socket = this.commandSocket;
    if (!socket || !this._connected) {
      return Promise.reject(
        new BridgeError(BridgeErrorCode.PROTOCOL_ERROR, 'sway IPC is not connected')
      );
    }

    return new Promise((resolve, reject) => {
      this.pendingReplies.push({ resolve, reject });
      socket.write(encodeMessage(type, payload));
    });
  }

  private handleCommandData(chunk: Buffer): void {
    for (const message of this.commandReader.push(chunk)) {
      const pending = this.pendingReplies.shift();
      if (!pending) {
        console.warn(`[SwayIpcClient] Unexpected reply of type ${message.type}`);
        continue;
      }
      pending.resolve(message);
    }
  }

  private handleEventData(chunk: Buffer): void {
    for (const message of this.eventReader.push(chunk)) {
      if (!isEventType(message.type)) {
        const pending = this.subscribeReply;
        this.subscribeReply = null;
        pending?.resolve(message);
        continue;
      }
      this.handleEvent(message);
    }
  }

  private handleEvent(message: SwayMessage): void {
    switch (message.type) {
      case SwayEventType.OUTPUT:
        this.onEvent?.({ type: WindowManagerEventType.OUTPUT });
        break;
      case SwayEventType.SHUTDOWN:
        this.onEvent?.({ type: WindowManagerEventType.SHUTDOWN });
        break;
      case SwayEventType.CURSOR_WARP: {
        const parsed = cursorWarpSchema.safeParse(parseJson(message.payload));
        if (!parsed.success) {
          console.warn('[SwayIpcClient] Dropping malformed cursor_warp event');
          return;
        }
        this.onEvent?.({ type: WindowManagerEventType.CURSOR_WARP, payload: parsed.data });
        break;
      }
    }
  }

  private handleFailure(message: string): void {
    if (this.closing) {
      return;
    }
    const wasConnected = this._connected;
    this._connected = false;
    this.rejectPending(message);

    if (wasConnected) {
      this.onError?.(message);
    }
  }

  private rejectPending(message: string): void {
    const error = new BridgeError(BridgeErrorCode.PROTOCOL_ERROR, message);
    for (const pending of this.pendingReplies.splice(0)) {
      pending.reject(error);
    }
    const subscribe = this.subscribeReply;
    this.subscribeReply = null;
    subscribe?.reject(error);
  }

  private destroySockets(): void {
    this.closing = true;
    this.commandSocket?.destroy();
    this.eventSocket?.destroy();
    this.commandSocket = null;
    this.eventSocket = null;
  }
}

function parseJson(payload: Buffer): unknown {
  try {
    return JSON.parse(payload.toString('utf8'));
  } catch {
    return undefined;
  }
}
