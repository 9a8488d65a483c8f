/**
 * Framed stdio protocol spoken with the remote display helper
 *
 * Every frame is `u8 type | u32 BE length | payload`. JSON payloads are
 * UTF-8. Transfer frames start with a `u32 BE` transfer id.
 */

import { z } from 'zod';
import { SelectionKind } from '../types/BridgeState';
import { RemoteEvent, RemoteEventType } from '../types/RemoteEvents';
import { RemoteCapabilities } from './RemoteDisplay';

export const FRAME_HEADER_SIZE = 5;

/**
 * Frames sent by the helper
 */
export enum HelperMessageType {
  HELLO = 0x01,
  EVENT = 0x02,
  TRANSFER_DATA = 0x03,
  TRANSFER_END = 0x04,
  TRANSFER_ERROR = 0x05,
  ERROR = 0x06,
}

/**
 * Frames sent to the helper
 */
export enum BridgeMessageType {
  REQUEST = 0x10,
  SOURCE_DATA = 0x11,
}

export type HelperRequest =
  | { op: 'create_virtual_pointer'; id: number; seat: number; output: number }
  | {
      op: 'motion_absolute';
      pointer: number;
      time: number;
      x: number;
      y: number;
      xExtent: number;
      yExtent: number;
    }
  | { op: 'frame'; pointer: number }
  | { op: 'destroy_virtual_pointer'; pointer: number }
  | { op: 'create_data_device'; id: number; seat: number }
  | { op: 'destroy_data_device'; device: number }
  | { op: 'create_data_source'; id: number; mimeTypes: string[] }
  | { op: 'destroy_data_source'; source: number }
  | { op: 'set_selection'; device: number; source: number | null; kind: SelectionKind }
  | { op: 'receive'; offer: number; mimeType: string; transfer: number }
  | { op: 'destroy_offer'; offer: number }
  | { op: 'release_output'; output: number }
  | { op: 'release_seat'; seat: number }
  | { op: 'destroy_toplevel'; toplevel: number }
  | { op: 'stop_toplevel_manager' };

export interface HelperFrame {
  type: number;
  payload: Buffer;
}

const id = z.number().int().nonnegative();
const selectionKind = z.enum(['regular', 'primary']);

export const capabilitiesSchema: z.ZodType<RemoteCapabilities> = z.object({
  virtualPointer: z.boolean(),
  toplevelManagement: z.boolean(),
  dataControl: z.boolean(),
});

export const remoteEventSchema: z.ZodType<RemoteEvent> = z.discriminatedUnion('type', [
  z.object({ type: z.literal(RemoteEventType.OUTPUT_ADDED), payload: z.object({ id }) }),
  z.object({
    type: z.literal(RemoteEventType.OUTPUT_NAME),
    payload: z.object({ id, name: z.string() }),
  }),
  z.object({ type: z.literal(RemoteEventType.OUTPUT_REMOVED), payload: z.object({ id }) }),
  z.object({ type: z.literal(RemoteEventType.SEAT_ADDED), payload: z.object({ id }) }),
  z.object({
    type: z.literal(RemoteEventType.SEAT_NAME),
    payload: z.object({ id, name: z.string() }),
  }),
  z.object({ type: z.literal(RemoteEventType.SEAT_REMOVED), payload: z.object({ id }) }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_ADDED),
    payload: z.object({ toplevel: id }),
  }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_TITLE),
    payload: z.object({ toplevel: id, title: z.string() }),
  }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_APP_ID),
    payload: z.object({ toplevel: id, appId: z.string() }),
  }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_OUTPUT_ENTER),
    payload: z.object({ toplevel: id, output: id }),
  }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_OUTPUT_LEAVE),
    payload: z.object({ toplevel: id, output: id }),
  }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_STATE),
    payload: z.object({ toplevel: id, states: z.array(z.string()) }),
  }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_DONE),
    payload: z.object({ toplevel: id }),
  }),
  z.object({
    type: z.literal(RemoteEventType.TOPLEVEL_CLOSED),
    payload: z.object({ toplevel: id }),
  }),
  z.object({ type: z.literal(RemoteEventType.TOPLEVEL_MANAGER_FINISHED) }),
  z.object({ type: z.literal(RemoteEventType.DATA_OFFER), payload: z.object({ offer: id }) }),
  z.object({
    type: z.literal(RemoteEventType.OFFER_MIME),
    payload: z.object({ offer: id, mimeType: z.string() }),
  }),
  z.object({
    type: z.literal(RemoteEventType.SELECTION),
    payload: z.object({ offer: id.nullable(), kind: selectionKind }),
  }),
  z.object({ type: z.literal(RemoteEventType.DATA_DEVICE_FINISHED) }),
  z.object({
    type: z.literal(RemoteEventType.SOURCE_SEND),
    payload: z.object({ source: id, mimeType: z.string(), transfer: id }),
  }),
  z.object({
    type: z.literal(RemoteEventType.SOURCE_CANCELLED),
    payload: z.object({ source: id }),
  }),
]);

export function encodeFrame(type: number, payload: Buffer): Buffer {
  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  header.writeUInt8(type, 0);
  header.writeUInt32BE(payload.length, 1);
  return Buffer.concat([header, payload]);
}

export function encodeRequest(request: HelperRequest): Buffer {
  return encodeFrame(BridgeMessageType.REQUEST, Buffer.from(JSON.stringify(request), 'utf8'));
}

export function encodeSourceData(transferId: number, data: Buffer | null): Buffer {
  const prefix = Buffer.alloc(4);
  prefix.writeUInt32BE(transferId, 0);
  return encodeFrame(
    BridgeMessageType.SOURCE_DATA,
    data ? Buffer.concat([prefix, data]) : prefix
  );
}

/**
 * Split a transfer frame payload into its transfer id and body
 */
export function decodeTransferPayload(payload: Buffer): { transferId: number; body: Buffer } {
  if (payload.length < 4) {
    throw new Error(`Transfer frame too short (${payload.length} bytes)`);
  }
  return { transferId: payload.readUInt32BE(0), body: payload.subarray(4) };
}

/**
 * Reassembles frames from an arbitrarily chunked byte stream
 */
export class FrameReader {
  private buffer = Buffer.alloc(0);

  get buffered(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer): HelperFrame[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const frames: HelperFrame[] = [];

    while (this.buffer.length >= FRAME_HEADER_SIZE) {
      const type = this.buffer.readUInt8(0);
      const length = this.buffer.readUInt32BE(1);

      if (this.buffer.length < FRAME_HEADER_SIZE + length) {
        break; // Wait for more data
      }

      frames.push({
        type,
        payload: this.buffer.subarray(FRAME_HEADER_SIZE, FRAME_HEADER_SIZE + length),
      });
      this.buffer = this.buffer.subarray(FRAME_HEADER_SIZE + length);
    }

    return frames;
  }
}
