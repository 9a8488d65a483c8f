/**
 * Remote display connection through the wayland-remote-helper executable
 *
 * The helper owns the Wayland socket and relays protocol traffic over its
 * stdio using the framed protocol in HelperProtocol. Requests are queued and
 * written on flush(); object ids are allocated here.
 */

import { spawn, ChildProcess } from 'child_process';
import { BridgeError, BridgeErrorCode, SelectionKind } from '../types/BridgeState';
import {
  FrameReader,
  HelperMessageType,
  HelperRequest,
  capabilitiesSchema,
  decodeTransferPayload,
  encodeRequest,
  encodeSourceData,
  remoteEventSchema,
} from './HelperProtocol';
import {
  ErrorCallback,
  RemoteCapabilities,
  RemoteDisplay,
  RemoteEventCallback,
} from './RemoteDisplay';

interface PendingTransfer {
  chunks: Buffer[];
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

interface PendingHello {
  resolve: () => void;
  reject: (error: Error) => void;
}

const NO_CAPABILITIES: RemoteCapabilities = {
  virtualPointer: false,
  toplevelManagement: false,
  dataControl: false,
};

export class HelperRemoteDisplay implements RemoteDisplay {
  private helperProcess: ChildProcess | null = null;
  private readonly reader = new FrameReader();
  private _capabilities: RemoteCapabilities = NO_CAPABILITIES;
  private _connected = false;
  private closing = false;
  private pendingHello: PendingHello | null = null;
  private outgoing: Buffer[] = [];
  private nextObjectId = 1;
  private nextTransferId = 1;
  private readonly transfers = new Map<number, PendingTransfer>();

  onEvent?: RemoteEventCallback;
  onError?: ErrorCallback;

  constructor(private readonly helperPath: string) {}

  get capabilities(): RemoteCapabilities {
    return this._capabilities;
  }

  get connected(): boolean {
    return this._connected;
  }

  /**
   * Spawn the helper and wait for its HELLO, sent once the registry
   * roundtrip has completed
   */
  connect(displayName: string): Promise<void> {
    if (this.helperProcess) {
      return Promise.reject(new Error('Remote display is already connected'));
    }

    console.log('[HelperRemoteDisplay] Running:', this.helperPath, [displayName]);

    return new Promise((resolve, reject) => {
      this.pendingHello = { resolve, reject };

      const helper = spawn(this.helperPath, [displayName], {
        stdio: ['pipe', 'pipe', 'pipe'],
      });
      this.helperProcess = helper;

      helper.stdout?.on('data', (chunk: Buffer) => {
        this.handleHelperData(chunk);
      });

      helper.stderr?.on('data', (data: Buffer) => {
        const message = data.toString().trim();
        if (message) {
          console.error('[remote-helper]', message);
        }
      });

      helper.stdin?.on('error', (err: Error) => {
        this.handleFailure(`Remote helper input failed: ${err.message}`);
      });

      helper.on('error', (err: Error) => {
        this.handleFailure(`Failed to run the remote helper: ${err.message}`);
      });

      helper.on('close', (code: number | null) => {
        this.handleFailure(`Remote helper exited with code ${code}`);
      });
    });
  }

  // Virtual pointer

  createVirtualPointer(seatId: number, outputId: number): number {
    const id = this.allocateId();
    this.queue({ op: 'create_virtual_pointer', id, seat: seatId, output: outputId });
    return id;
  }

  motionAbsolute(
    pointerId: number,
    time: number,
    x: number,
    y: number,
    xExtent: number,
    yExtent: number
  ): void {
    this.queue({ op: 'motion_absolute', pointer: pointerId, time, x, y, xExtent, yExtent });
  }

  frame(pointerId: number): void {
    this.queue({ op: 'frame', pointer: pointerId });
  }

  destroyVirtualPointer(pointerId: number): void {
    this.queue({ op: 'destroy_virtual_pointer', pointer: pointerId });
  }

  // Clipboard

  createDataDevice(seatId: number): number {
    const id = this.allocateId();
    this.queue({ op: 'create_data_device', id, seat: seatId });
    return id;
  }

  destroyDataDevice(deviceId: number): void {
    this.queue({ op: 'destroy_data_device', device: deviceId });
  }

  createDataSource(mimeTypes: readonly string[]): number {
    const id = this.allocateId();
    this.queue({ op: 'create_data_source', id, mimeTypes: [...mimeTypes] });
    return id;
  }

  destroyDataSource(sourceId: number): void {
    this.queue({ op: 'destroy_data_source', source: sourceId });
  }

  setSelection(deviceId: number, sourceId: number | null, kind: SelectionKind): void {
    this.queue({ op: 'set_selection', device: deviceId, source: sourceId, kind });
  }

  receive(offerId: number, mimeType: string): Promise<Buffer> {
    if (!this._connected) {
      return Promise.reject(
        new BridgeError(BridgeErrorCode.PROTOCOL_ERROR, 'Remote display is not connected')
      );
    }

    const transfer = this.nextTransferId++;
    const result = new Promise<Buffer>((resolve, reject) => {
      this.transfers.set(transfer, { chunks: [], resolve, reject });
    });

    this.queue({ op: 'receive', offer: offerId, mimeType, transfer });
    this.flush();
    return result;
  }

  destroyOffer(offerId: number): void {
    this.queue({ op: 'destroy_offer', offer: offerId });
  }

  sendSourceData(transferId: number, data: Buffer | null): void {
    this.outgoing.push(encodeSourceData(transferId, data));
  }

  // Object release

  releaseOutput(outputId: number): void {
    this.queue({ op: 'release_output', output: outputId });
  }

  releaseSeat(seatId: number): void {
    this.queue({ op: 'release_seat', seat: seatId });
  }

  destroyToplevel(toplevelId: number): void {
    this.queue({ op: 'destroy_toplevel', toplevel: toplevelId });
  }

  stopToplevelManager(): void {
    this.queue({ op: 'stop_toplevel_manager' });
  }

  flush(): void {
    if (this.outgoing.length === 0) {
      return;
    }
    const stdin = this.helperProcess?.stdin;
    if (!this._connected || !stdin) {
      this.outgoing = [];
      return;
    }

    stdin.write(Buffer.concat(this.outgoing));
    this.outgoing = [];
  }

  disconnect(): void {
    const helper = this.helperProcess;
    if (!helper) {
      return;
    }

    this.flush();
    this.closing = true;
    this._connected = false;
    this.rejectTransfers('Remote display disconnected');

    helper.stdin?.end();
    helper.kill();
    this.helperProcess = null;
    console.log('[HelperRemoteDisplay] Disconnected');
  }

  private allocateId(): number {
    return this.nextObjectId++;
  }

  private queue(request: HelperRequest): void {
    this.outgoing.push(encodeRequest(request));
  }

  private handleHelperData(chunk: Buffer): void {
    for (const frame of this.reader.push(chunk)) {
      try {
        this.processMessage(frame.type, frame.payload);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.handleFailure(`Remote helper protocol error: ${message}`);
      }
    }
  }

  private processMessage(type: number, payload: Buffer): void {
    switch (type) {
      case HelperMessageType.HELLO:
        this.handleHello(payload);
        break;
      case HelperMessageType.EVENT:
        this.handleEvent(payload);
        break;
      case HelperMessageType.TRANSFER_DATA:
        this.handleTransferData(payload);
        break;
      case HelperMessageType.TRANSFER_END:
        this.handleTransferEnd(payload);
        break;
      case HelperMessageType.TRANSFER_ERROR:
        this.handleTransferError(payload);
        break;
      case HelperMessageType.ERROR:
        this.handleFailure(payload.toString('utf8'));
        break;
      default:
        console.warn(`[HelperRemoteDisplay] Unknown message type: 0x${type.toString(16)}`);
    }
  }

  private handleHello(payload: Buffer): void {
    const hello = this.pendingHello;
    if (!hello) {
      console.warn('[HelperRemoteDisplay] Unexpected HELLO');
      return;
    }

    const parsed = capabilitiesSchema.safeParse(parseJson(payload));
    if (!parsed.success) {
      this.handleFailure(`Invalid HELLO from the remote helper: ${parsed.error.message}`);
      return;
    }

    this.pendingHello = null;
    this._capabilities = parsed.data;
    this._connected = true;
    console.log('[HelperRemoteDisplay] Connected, capabilities:', parsed.data);
    hello.resolve();
  }

  private handleEvent(payload: Buffer): void {
    const parsed = remoteEventSchema.safeParse(parseJson(payload));
    if (!parsed.success) {
      console.warn('[HelperRemoteDisplay] Dropping malformed event:', payload.toString('utf8'));
      return;
    }
    this.onEvent?.(parsed.data);
  }

  private handleTransferData(payload: Buffer): void {
    const { transferId, body } = decodeTransferPayload(payload);
    const transfer = this.transfers.get(transferId);
    if (!transfer) {
      console.warn(`[HelperRemoteDisplay] Data for unknown transfer ${transferId}`);
      return;
    }
    transfer.chunks.push(Buffer.from(body));
  }

  private handleTransferEnd(payload: Buffer): void {
    const { transferId } = decodeTransferPayload(payload);
    const transfer = this.transfers.get(transferId);
    if (!transfer) {
      console.warn(`[HelperRemoteDisplay] End of unknown transfer ${transferId}`);
      return;
    }
    this.transfers.delete(transferId);
    transfer.resolve(Buffer.concat(transfer.chunks));
  }

  private handleTransferError(payload: Buffer): void {
    const { transferId, body } = decodeTransferPayload(payload);
    const transfer = this.transfers.get(transferId);
    if (!transfer) {
      console.warn(`[HelperRemoteDisplay] Error for unknown transfer ${transferId}`);
      return;
    }
    this.transfers.delete(transferId);
    transfer.reject(new BridgeError(BridgeErrorCode.PROTOCOL_ERROR, body.toString('utf8')));
  }

  private handleFailure(message: string): void {
    if (this.closing) {
      return;
    }
    const wasConnected = this._connected;
    this._connected = false;
    this.rejectTransfers(message);

    const hello = this.pendingHello;
    if (hello) {
      this.pendingHello = null;
      this.closing = true;
      this.helperProcess?.kill();
      hello.reject(new BridgeError(BridgeErrorCode.CONNECT_FAILED, message));
      return;
    }

    if (wasConnected) {
      this.onError?.(message);
    }
  }

  private rejectTransfers(message: string): void {
    for (const transfer of this.transfers.values()) {
      transfer.reject(new BridgeError(BridgeErrorCode.PROTOCOL_ERROR, message));
    }
    this.transfers.clear();
  }
}

function parseJson(payload: Buffer): unknown {
  try {
    return JSON.parse(payload.toString('utf8'));
  } catch {
    return undefined;
  }
}
