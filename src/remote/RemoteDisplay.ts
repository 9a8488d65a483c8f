/**
 * Remote display interface - abstraction over the remote compositor session
 */

import { SelectionKind } from '../types/BridgeState';
import { RemoteEvent } from '../types/RemoteEvents';

/**
 * Optional and mandatory protocol capabilities advertised by the remote
 */
export interface RemoteCapabilities {
  virtualPointer: boolean;
  toplevelManagement: boolean;
  dataControl: boolean;
}

/**
 * Callback for remote notifications
 */
export type RemoteEventCallback = (event: RemoteEvent) => void;

/**
 * Callback for errors/hangups on the remote connection
 */
export type ErrorCallback = (message: string) => void;

/**
 * Interface for remote display connections
 *
 * Implemented by:
 * - HelperRemoteDisplay (framed protocol over a helper process's stdio)
 */
export interface RemoteDisplay {
  /**
   * Capabilities found during the initial registry roundtrip
   */
  readonly capabilities: RemoteCapabilities;

  /**
   * Whether the connection is currently active
   */
  readonly connected: boolean;

  onEvent?: RemoteEventCallback;
  onError?: ErrorCallback;

  /**
   * Connect to the remote display and complete the registry roundtrip
   */
  connect(displayName: string): Promise<void>;

  // Virtual pointer

  /**
   * Create a virtual pointer bound to a seat and an output, returns its id
   */
  createVirtualPointer(seatId: number, outputId: number): number;

  motionAbsolute(
    pointerId: number,
    time: number,
    x: number,
    y: number,
    xExtent: number,
    yExtent: number
  ): void;

  frame(pointerId: number): void;

  destroyVirtualPointer(pointerId: number): void;

  // Clipboard

  /**
   * Create a clipboard device bound to a seat, returns its id
   */
  createDataDevice(seatId: number): number;

  destroyDataDevice(deviceId: number): void;

  /**
   * Create a selection source offering the given MIME types, returns its id
   */
  createDataSource(mimeTypes: readonly string[]): number;

  destroyDataSource(sourceId: number): void;

  /**
   * Install a source as the selection of the given kind, or clear it with null
   */
  setSelection(deviceId: number, sourceId: number | null, kind: SelectionKind): void;

  /**
   * Read the full payload of an offer in one MIME type
   */
  receive(offerId: number, mimeType: string): Promise<Buffer>;

  destroyOffer(offerId: number): void;

  /**
   * Answer a source send request. Null closes the transfer without data.
   */
  sendSourceData(transferId: number, data: Buffer | null): void;

  // Object release

  releaseOutput(outputId: number): void;

  releaseSeat(seatId: number): void;

  destroyToplevel(toplevelId: number): void;

  stopToplevelManager(): void;

  /**
   * Write out queued requests
   */
  flush(): void;

  disconnect(): void;
}
