import { performance } from 'perf_hooks';
import { sameHandle } from './Arena';
import { BridgeContext } from './BridgeContext';
import { forwardTransform } from './CoordinateTransform';
import { OutputHandle, SeatHandle } from './ObjectTracker';
import { HostProperty } from './host/HostProperties';
import { Point } from './types/BridgeState';

interface VirtualPointerDevice {
  id: number;
  seat: SeatHandle;
  output: OutputHandle;
}

/**
 * Monotonic millisecond timestamp, wrapped to 32 bits
 */
export function motionTimestamp(): number {
  return Math.floor(performance.now()) >>> 0;
}

/**
 * Owns the singleton virtual pointer and forwards host pointer motion to it.
 *
 * The device exists exactly while the output and seat are matched, forwarding
 * is enabled and grab mode is off. Its (seat, output) binding is fixed at
 * creation.
 */
export class PointerBridge {
  private device: VirtualPointerDevice | null = null;
  private pendingWarpEcho: Point | null = null;

  constructor(private readonly ctx: BridgeContext) {}

  get active(): boolean {
    return this.device !== null;
  }

  get deviceId(): number | null {
    return this.device?.id ?? null;
  }

  shouldExist(): boolean {
    const { tracker, flags } = this.ctx;
    return (
      tracker.matchedOutput !== null &&
      tracker.matchedSeat !== null &&
      flags.forwarding &&
      !flags.forceGrab
    );
  }

  /**
   * Bring device existence and binding in line with the current state
   */
  reevaluate(): void {
    const { tracker } = this.ctx;
    const shouldExist = this.shouldExist();

    if (this.device) {
      const rebound =
        !sameHandle(this.device.seat, tracker.matchedSeat) ||
        !sameHandle(this.device.output, tracker.matchedOutput);
      if (!shouldExist || rebound) {
        this.destroyDevice();
      }
    }

    if (shouldExist && !this.device) {
      this.createDevice();
    }
  }

  /**
   * Forward a host pointer position to the remote output
   */
  handlePositionChanged(position: Point): void {
    if (!this.device) {
      return;
    }

    const echo = this.pendingWarpEcho;
    this.pendingWarpEcho = null;
    if (echo && echo.x === position.x && echo.y === position.y) {
      return;
    }

    const { drawingArea, video, display } = this.ctx;
    const remote = forwardTransform(position, drawingArea, video);
    if (!remote) {
      return;
    }

    display.motionAbsolute(this.device.id, motionTimestamp(), remote.x, remote.y, video.w, video.h);
    display.frame(this.device.id);
  }

  /**
   * Note a host position written by the warp relay so that its change
   * notification is not forwarded back as motion
   */
  expectWarpEcho(position: Point): void {
    this.pendingWarpEcho = { x: position.x, y: position.y };
  }

  destroy(): void {
    if (this.device) {
      this.destroyDevice();
    }
  }

  private createDevice(): void {
    const { tracker, display, host } = this.ctx;
    const seatHandle = tracker.matchedSeat;
    const outputHandle = tracker.matchedOutput;
    const seat = seatHandle ? tracker.getSeat(seatHandle) : undefined;
    const output = outputHandle ? tracker.getOutput(outputHandle) : undefined;
    if (!seatHandle || !outputHandle || !seat || !output) {
      return;
    }

    const id = display.createVirtualPointer(seat.id, output.id);
    this.device = { id, seat: seatHandle, output: outputHandle };
    this.pendingWarpEcho = null;
    console.log(`[PointerBridge] Virtual pointer bound to seat ${seat.name} and output ${output.name}`);

    host.observeProperty(HostProperty.MOUSE_POS).catch((error: unknown) => {
      console.error('[PointerBridge] Failed to observe the mouse-pos property:', error);
    });
  }

  private destroyDevice(): void {
    if (!this.device) {
      return;
    }
    const { display, host } = this.ctx;

    display.destroyVirtualPointer(this.device.id);
    this.device = null;
    this.pendingWarpEcho = null;
    console.log('[PointerBridge] Virtual pointer destroyed');

    host.unobserveProperty(HostProperty.MOUSE_POS).catch((error: unknown) => {
      console.error('[PointerBridge] Failed to unobserve the mouse-pos property:', error);
    });
  }
}
