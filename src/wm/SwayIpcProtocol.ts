/**
 * sway IPC wire format: `"i3-ipc" | u32 LE length | u32 LE type | JSON`
 */

import { z } from 'zod';

export const IPC_MAGIC = Buffer.from('i3-ipc', 'ascii');
export const IPC_HEADER_SIZE = IPC_MAGIC.length + 8;

export enum SwayMessageType {
  SUBSCRIBE = 2,
  GET_OUTPUTS = 3,
}

/**
 * Event types carry the high bit
 */
export enum SwayEventType {
  OUTPUT = 0x80000001,
  SHUTDOWN = 0x80000006,
  CURSOR_WARP = 0x80000016,
}

export const SUBSCRIBED_EVENTS = ['output', 'shutdown', 'cursor_warp'];

export interface SwayMessage {
  type: number;
  payload: Buffer;
}

export const outputsReplySchema = z.array(
  z.object({
    name: z.string(),
    rect: z.object({
      x: z.number().int(),
      y: z.number().int(),
      width: z.number().int(),
      height: z.number().int(),
    }),
  })
);

export const subscribeReplySchema = z.object({ success: z.boolean() });

export const cursorWarpSchema = z.object({
  lx: z.number().int(),
  ly: z.number().int(),
});

export function isEventType(type: number): boolean {
  return (type & 0x80000000) !== 0;
}

export function encodeMessage(type: number, payload = ''): Buffer {
  const body = Buffer.from(payload, 'utf8');
  const header = Buffer.alloc(IPC_HEADER_SIZE);
  IPC_MAGIC.copy(header, 0);
  header.writeUInt32LE(body.length, IPC_MAGIC.length);
  header.writeUInt32LE(type, IPC_MAGIC.length + 4);
  return Buffer.concat([header, body]);
}

/**
 * Reassembles IPC messages from a chunked stream. Throws on a bad magic
 * string since the stream cannot be resynchronized.
 */
export class SwayMessageReader {
  private buffer = Buffer.alloc(0);

  push(chunk: Buffer): SwayMessage[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const messages: SwayMessage[] = [];

    while (this.buffer.length >= IPC_HEADER_SIZE) {
      if (!this.buffer.subarray(0, IPC_MAGIC.length).equals(IPC_MAGIC)) {
        throw new Error('Invalid sway IPC magic');
      }
      const length = this.buffer.readUInt32LE(IPC_MAGIC.length);
      const type = this.buffer.readUInt32LE(IPC_MAGIC.length + 4);

      if (this.buffer.length < IPC_HEADER_SIZE + length) {
        break;
      }

      messages.push({
        type,
        payload: this.buffer.subarray(IPC_HEADER_SIZE, IPC_HEADER_SIZE + length),
      });
      this.buffer = this.buffer.subarray(IPC_HEADER_SIZE + length);
    }

    return messages;
  }
}
