/**
 * mpv JSON IPC client (--input-ipc-server)
 *
 * Newline-delimited JSON over a UNIX socket. Replies are matched to requests
 * by request_id; property observers are addressed by name and their numeric
 * ids are managed here.
 */

import * as net from 'net';
import { z } from 'zod';
import { BridgeError, BridgeErrorCode } from '../types/BridgeState';
import { HostBus, HostEvent, HostEventType } from './HostBus';

const replySchema = z.object({
  request_id: z.number().int(),
  error: z.string(),
  data: z.unknown().optional(),
});

const eventSchema = z.object({
  event: z.string(),
  id: z.number().int().optional(),
  name: z.string().optional(),
  data: z.unknown().optional(),
});

interface PendingRequest {
  command: string;
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
}

const NEWLINE = 0x0a;

export class MpvIpcClient implements HostBus {
  private socket: net.Socket | null = null;
  private _connected = false;
  private closing = false;
  private buffer = Buffer.alloc(0);
  private nextRequestId = 1;
  private nextObserveId = 1;
  private readonly pendingRequests = new Map<number, PendingRequest>();
  private readonly observers = new Map<string, number>();

  onEvent?: (event: HostEvent) => void;
  onError?: (message: string) => void;

  constructor(private readonly socketPath: string) {}

  get connected(): boolean {
    return this._connected;
  }

  connect(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('Host IPC is already connected'));
    }

    return new Promise((resolve, reject) => {
      const socket = net.createConnection(this.socketPath);
      this.socket = socket;
      let settled = false;

      socket.on('connect', () => {
        settled = true;
        this._connected = true;
        console.log(`[MpvIpcClient] Connected to ${this.socketPath}`);
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        this.handleData(chunk);
      });

      socket.on('error', (err: Error) => {
        if (!settled) {
          settled = true;
          this.socket = null;
          reject(
            new BridgeError(
              BridgeErrorCode.CONNECT_FAILED,
              `Failed to connect to host IPC at ${this.socketPath}: ${err.message}`
            )
          );
          return;
        }
        console.error('[MpvIpcClient] Socket error:', err.message);
        this.handleClosed(`Host IPC error: ${err.message}`);
      });

      socket.on('close', () => {
        this.handleClosed('Host IPC connection closed');
      });
    });
  }

  async getProperty(name: string): Promise<unknown> {
    return this.request(['get_property', name]);
  }

  async setProperty(name: string, value: unknown): Promise<void> {
    await this.request(['set_property', name, value]);
  }

  async observeProperty(name: string): Promise<void> {
    if (this.observers.has(name)) {
      return;
    }
    const id = this.nextObserveId++;
    this.observers.set(name, id);
    try {
      await this.request(['observe_property', id, name]);
    } catch (error) {
      if (this.observers.get(name) === id) {
        this.observers.delete(name);
      }
      throw error;
    }
  }

  async unobserveProperty(name: string): Promise<void> {
    const id = this.observers.get(name);
    if (id === undefined) {
      return;
    }
    this.observers.delete(name);
    await this.request(['unobserve_property', id]);
  }

  disconnect(): void {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.closing = true;
    this._connected = false;
    this.socket = null;
    this.rejectPending('Host IPC disconnected');
    socket.end();
    console.log('[MpvIpcClient] Disconnected');
  }

  private request(command: unknown[]): Promise<unknown> {
    const socket = this.socket;
    if (!socket || !this._connected) {
      return Promise.reject(
        new BridgeError(BridgeErrorCode.HOST_REQUEST_FAILED, 'Host IPC is not connected')
      );
    }

    const requestId = this.nextRequestId++;
    return new Promise((resolve, reject) => {
      this.pendingRequests.set(requestId, {
        command: String(command[0]),
        resolve,
        reject,
      });
      socket.write(JSON.stringify({ command, request_id: requestId }) + '\n');
    });
  }

  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    let newline = this.buffer.indexOf(NEWLINE);
    while (newline !== -1) {
      const line = this.buffer.subarray(0, newline).toString('utf8').trim();
      this.buffer = this.buffer.subarray(newline + 1);
      if (line) {
        this.handleLine(line);
      }
      newline = this.buffer.indexOf(NEWLINE);
    }
  }

  private handleLine(line: string): void {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      console.warn('[MpvIpcClient] Dropping malformed line:', line);
      return;
    }

    const event = eventSchema.safeParse(message);
    if (event.success) {
      this.handleEvent(event.data);
      return;
    }

    const reply = replySchema.safeParse(message);
    if (reply.success) {
      this.handleReply(reply.data);
      return;
    }

    console.warn('[MpvIpcClient] Dropping unrecognized message:', line);
  }

  private handleReply(reply: z.infer<typeof replySchema>): void {
    const pending = this.pendingRequests.get(reply.request_id);
    if (!pending) {
      return;
    }
    this.pendingRequests.delete(reply.request_id);

    if (reply.error === 'success') {
      pending.resolve(reply.data);
    } else {
      pending.reject(
        new BridgeError(
          BridgeErrorCode.HOST_REQUEST_FAILED,
          `${pending.command} failed: ${reply.error}`
        )
      );
    }
  }

  private handleEvent(event: z.infer<typeof eventSchema>): void {
    switch (event.event) {
      case 'property-change': {
        const name = event.name;
        // Late changes for a property that is no longer observed are dropped
        if (name === undefined || !this.observers.has(name)) {
          return;
        }
        this.onEvent?.({
          type: HostEventType.PROPERTY_CHANGE,
          payload: { name, data: event.data },
        });
        break;
      }
      case 'shutdown':
        this.onEvent?.({ type: HostEventType.SHUTDOWN });
        break;
    }
  }

  private handleClosed(message: string): void {
    const wasConnected = this._connected;
    this._connected = false;
    this.rejectPending(message);

    if (!this.closing && wasConnected) {
      this.onError?.(message);
    }
  }

  private rejectPending(message: string): void {
    for (const pending of this.pendingRequests.values()) {
      pending.reject(new BridgeError(BridgeErrorCode.HOST_REQUEST_FAILED, message));
    }
    this.pendingRequests.clear();
  }
}
