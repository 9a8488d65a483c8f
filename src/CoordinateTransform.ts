/**
 * Pixel mapping between the host's drawing area and the remote output
 *
 * Arithmetic truncates toward zero in both directions so that a forward
 * mapping followed by the inverse lands within one unit of the input.
 */

import { DrawingAreaMetrics, Point, VideoMetrics } from './types/BridgeState';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Map a host pointer position inside the drawing area to remote pixels.
 * Returns null when the drawing area has no usable extent.
 */
export function forwardTransform(
  pointer: Point,
  area: DrawingAreaMetrics,
  video: VideoMetrics
): Point | null {
  const dx = area.w - area.ml - area.mr;
  const dy = area.h - area.mt - area.mb;

  if (dx === 0 || dy === 0) {
    return null;
  }

  const rx = Math.trunc(((pointer.x - area.ml) * video.w) / dx);
  const ry = Math.trunc(((pointer.y - area.mt) * video.h) / dy);

  return {
    x: clamp(rx, 0, video.w),
    y: clamp(ry, 0, video.h),
  };
}

/**
 * Map a remote pixel position back to a host pointer position.
 * Returns null when the video has no size yet.
 */
export function inverseTransform(
  local: Point,
  area: DrawingAreaMetrics,
  video: VideoMetrics
): Point | null {
  if (video.w === 0 || video.h === 0) {
    return null;
  }

  const dx = area.w - area.ml - area.mr;
  const dy = area.h - area.mt - area.mb;

  const x = Math.trunc((local.x * dx) / video.w) + area.ml;
  const y = Math.trunc((local.y * dy) / video.h) + area.mt;

  return {
    x: clamp(x, 0, area.w),
    y: clamp(y, 0, area.h),
  };
}
