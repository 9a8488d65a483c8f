/**
 * Host property names and payload schemas
 */

import { z } from 'zod';
import { SelectionKind } from '../types/BridgeState';

export const HostProperty = {
  MOUSE_POS: 'mouse-pos',
  OSD_DIMENSIONS: 'osd-dimensions',
  VIDEO_PARAMS: 'video-params',
  CLIPBOARD_TEXT: 'clipboard/text',
  CLIPBOARD_TEXT_PRIMARY: 'clipboard/text-primary',
  INPUT_FORWARDING: 'wayland-remote-input-forwarding',
  FORCE_GRAB_CURSOR: 'wayland-remote-force-grab-cursor',
  MEDIA_TITLE: 'force-media-title',
} as const;

const int = z.number().int();

export const mousePosSchema = z.object({
  x: int,
  y: int,
  hover: z.boolean().optional(),
});

export const osdDimensionsSchema = z.object({
  w: int,
  h: int,
  ml: int,
  mr: int,
  mt: int,
  mb: int,
});

export const videoParamsSchema = z.object({
  w: int,
  h: int,
});

export const flagSchema = z.boolean();

export const clipboardTextSchema = z.string().nullish();

export type MousePos = z.infer<typeof mousePosSchema>;

export function clipboardPropertyFor(kind: SelectionKind): string {
  return kind === 'primary' ? HostProperty.CLIPBOARD_TEXT_PRIMARY : HostProperty.CLIPBOARD_TEXT;
}
