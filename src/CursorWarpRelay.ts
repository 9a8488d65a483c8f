import { BridgeContext } from './BridgeContext';
import { inverseTransform } from './CoordinateTransform';
import { PointerBridge } from './PointerBridge';
import { HostProperty, MousePos } from './host/HostProperties';
import { OutputLayoutOrigin } from './types/BridgeState';

/**
 * Writes pointer warps reported by the window manager back into the host's
 * pointer position.
 *
 * The written position is announced to the pointer bridge first, so the
 * host's change notification for it is not forwarded to the remote again.
 */
export class CursorWarpRelay {
  private _origin: OutputLayoutOrigin = { x: 0, y: 0 };

  constructor(
    private readonly ctx: BridgeContext,
    private readonly pointer: PointerBridge
  ) {}

  get origin(): OutputLayoutOrigin {
    return this._origin;
  }

  /**
   * Re-read the layout-space origin of the remote output. The previous origin
   * is kept when the output is not listed.
   */
  async updateOutputLayout(): Promise<void> {
    const windowManager = this.ctx.windowManager;
    if (!windowManager) {
      return;
    }

    let outputs;
    try {
      outputs = await windowManager.getOutputs();
    } catch (error) {
      console.error('[CursorWarpRelay] Failed to query the output layout:', error);
      return;
    }

    const output = outputs.find((candidate) => candidate.name === this.ctx.config.outputName);
    if (!output) {
      console.warn(`[CursorWarpRelay] Output ${this.ctx.config.outputName} is not in the layout`);
      return;
    }
    this._origin = { x: output.rect.x, y: output.rect.y };
  }

  async handleCursorWarp(layoutX: number, layoutY: number): Promise<void> {
    const { flags, drawingArea, video, host } = this.ctx;
    if (flags.forceGrab) {
      return;
    }

    const local = { x: layoutX - this._origin.x, y: layoutY - this._origin.y };
    const position = inverseTransform(local, drawingArea, video);
    if (!position) {
      return;
    }

    const value: MousePos = { x: position.x, y: position.y, hover: true };
    if (this.pointer.active) {
      this.pointer.expectWarpEcho(position);
    }
    try {
      await host.setProperty(HostProperty.MOUSE_POS, value);
    } catch (error) {
      console.error('[CursorWarpRelay] Failed to set the host pointer position:', error);
    }
  }
}
