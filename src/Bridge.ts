/**
 * Bridge orchestrator - setup, event loop and teardown
 */

import { z } from 'zod';
import { BridgeContext, ContextConfig } from './BridgeContext';
import { ClipboardRelay } from './ClipboardRelay';
import { CursorWarpRelay } from './CursorWarpRelay';
import { DispatchResult, EventMultiplexer, EventQueue, LoopExit } from './EventMultiplexer';
import { PointerBridge } from './PointerBridge';
import { TitleSynchronizer } from './TitleSynchronizer';
import { HostBus, HostEvent, HostEventType } from './host/HostBus';
import {
  HostProperty,
  clipboardTextSchema,
  flagSchema,
  mousePosSchema,
  osdDimensionsSchema,
  videoParamsSchema,
} from './host/HostProperties';
import { RemoteDisplay } from './remote/RemoteDisplay';
import { BridgeError, BridgeErrorCode } from './types/BridgeState';
import { RemoteEvent, isClipboardEvent } from './types/RemoteEvents';
import {
  WindowManagerEvent,
  WindowManagerEventType,
  WindowManagerIpc,
} from './wm/WindowManagerIpc';

export interface BridgeAdapters {
  display: RemoteDisplay;
  host: HostBus;
  /** null when no window-manager socket is configured */
  windowManager: WindowManagerIpc | null;
}

export interface BridgeOptions {
  selfTagMimeType?: string;
}

/**
 * Properties observed for the whole session
 */
const SESSION_PROPERTIES = [
  HostProperty.OSD_DIMENSIONS,
  HostProperty.VIDEO_PARAMS,
  HostProperty.INPUT_FORWARDING,
  HostProperty.FORCE_GRAB_CURSOR,
];

export class Bridge {
  readonly ctx: BridgeContext;
  readonly pointer: PointerBridge;
  readonly clipboard: ClipboardRelay;
  readonly title: TitleSynchronizer;
  readonly warp: CursorWarpRelay;

  private readonly multiplexer: EventMultiplexer;
  private readonly displayQueue: EventQueue<RemoteEvent>;
  private readonly hostQueue: EventQueue<HostEvent>;
  private readonly windowManagerQueue: EventQueue<WindowManagerEvent>;
  private tornDown = false;

  constructor(config: ContextConfig, adapters: BridgeAdapters, options: BridgeOptions = {}) {
    this.ctx = new BridgeContext(config, adapters.display, adapters.host, adapters.windowManager, {
      onMatchChanged: () => this.reevaluateDevices(),
      onCurrentWindowChanged: (window) => this.title.handleCurrentWindowChanged(window),
    });
    this.pointer = new PointerBridge(this.ctx);
    this.clipboard = new ClipboardRelay(this.ctx, options.selfTagMimeType);
    this.title = new TitleSynchronizer(this.ctx);
    this.warp = new CursorWarpRelay(this.ctx, this.pointer);

    // Drained in this order after every wake
    this.multiplexer = new EventMultiplexer(() => this.ctx.display.flush());
    this.displayQueue = this.multiplexer.register<RemoteEvent>('display', (event) =>
      this.dispatchRemoteEvent(event)
    );
    this.hostQueue = this.multiplexer.register<HostEvent>('host', (event) =>
      this.dispatchHostEvent(event)
    );
    this.windowManagerQueue = this.multiplexer.register<WindowManagerEvent>(
      'window manager',
      (event) => this.dispatchWindowManagerEvent(event)
    );
  }

  /**
   * Connect the collaborators and publish the initial state. Throws a
   * BridgeError on any fatal failure; call teardown() afterwards either way.
   */
  async setup(): Promise<void> {
    const { display, host, config } = this.ctx;

    host.onEvent = (event) => this.hostQueue.push(event);
    host.onError = (message) => this.hostQueue.fail(message);
    await host.connect();

    display.onEvent = (event) => this.displayQueue.push(event);
    display.onError = (message) => this.displayQueue.fail(message);
    await display.connect(config.displayName);

    if (!display.capabilities.virtualPointer) {
      throw new BridgeError(
        BridgeErrorCode.MISSING_CAPABILITY,
        'Remote display has no virtual pointer manager'
      );
    }
    if (!display.capabilities.toplevelManagement) {
      console.warn('[Bridge] No toplevel manager on the remote, the media title will stay generic');
    }
    if (!display.capabilities.dataControl) {
      console.warn('[Bridge] No data control manager on the remote, clipboard sync is disabled');
    }

    await this.connectWindowManager();

    this.title.publishGeneric();
    await this.warp.updateOutputLayout();

    for (const property of SESSION_PROPERTIES) {
      try {
        await host.observeProperty(property);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new BridgeError(
          BridgeErrorCode.HOST_REQUEST_FAILED,
          `Failed to observe the ${property} property: ${message}`
        );
      }
    }

    this.ctx.flags.forwarding = await this.readFlag(
      HostProperty.INPUT_FORWARDING,
      this.ctx.flags.forwarding
    );
    this.ctx.flags.forceGrab = await this.readFlag(
      HostProperty.FORCE_GRAB_CURSOR,
      this.ctx.flags.forceGrab
    );
    this.reevaluateDevices();

    console.log(
      `[Bridge] Bridging ${config.displayName} (output ${config.outputName}, seat ${config.seatName})`
    );
  }

  /**
   * Run the event loop until shutdown or a fatal I/O error
   */
  async run(): Promise<LoopExit> {
    const exit = await this.multiplexer.run();
    if (exit.reason === 'shutdown') {
      console.log(`[Bridge] Shutdown requested by ${exit.source}`);
    } else {
      console.error(`[Bridge] Stopping on ${exit.source} failure: ${exit.message}`);
    }
    return exit;
  }

  /**
   * Request an orderly shutdown of the loop
   */
  stop(): void {
    this.hostQueue.push({ type: HostEventType.SHUTDOWN });
  }

  /**
   * Release everything created by setup() and the loop, dependents first
   */
  async teardown(): Promise<void> {
    if (this.tornDown) {
      return;
    }
    this.tornDown = true;
    const { display, host, tracker, windowManager } = this.ctx;

    tracker.destroyAll();
    this.clipboard.destroy();
    this.pointer.destroy();
    const { toplevelManagement } = display.capabilities;
    if (display.connected && toplevelManagement && !tracker.toplevelManagerFinished) {
      display.stopToplevelManager();
    }
    display.disconnect();
    windowManager?.disconnect();

    if (host.connected) {
      await this.title.clear();
    }
    host.disconnect();
  }

  async dispatchRemoteEvent(event: RemoteEvent): Promise<DispatchResult> {
    if (isClipboardEvent(event)) {
      await this.clipboard.handleEvent(event);
    } else {
      this.ctx.tracker.dispatch(event);
    }
    return 'continue';
  }

  async dispatchHostEvent(event: HostEvent): Promise<DispatchResult> {
    switch (event.type) {
      case HostEventType.SHUTDOWN:
        return 'shutdown';
      case HostEventType.PROPERTY_CHANGE:
        this.handlePropertyChange(event.payload.name, event.payload.data);
        return 'continue';
    }
  }

  async dispatchWindowManagerEvent(event: WindowManagerEvent): Promise<DispatchResult> {
    switch (event.type) {
      case WindowManagerEventType.SHUTDOWN:
        return 'shutdown';
      case WindowManagerEventType.OUTPUT:
        await this.warp.updateOutputLayout();
        return 'continue';
      case WindowManagerEventType.CURSOR_WARP:
        await this.warp.handleCursorWarp(event.payload.lx, event.payload.ly);
        return 'continue';
    }
  }

  private handlePropertyChange(name: string, data: unknown): void {
    const { ctx } = this;

    switch (name) {
      case HostProperty.MOUSE_POS: {
        const position = parseProperty(mousePosSchema, name, data);
        if (position) {
          this.pointer.handlePositionChanged(position);
        }
        break;
      }
      case HostProperty.OSD_DIMENSIONS: {
        const area = parseProperty(osdDimensionsSchema, name, data);
        if (area) {
          ctx.drawingArea = area;
        }
        break;
      }
      case HostProperty.VIDEO_PARAMS: {
        const video = parseProperty(videoParamsSchema, name, data);
        if (video) {
          ctx.video = video;
        }
        break;
      }
      case HostProperty.CLIPBOARD_TEXT:
      case HostProperty.CLIPBOARD_TEXT_PRIMARY: {
        const text = clipboardTextSchema.safeParse(data);
        if (!text.success) {
          console.warn(`[Bridge] Unexpected ${name} format`);
          break;
        }
        this.clipboard.publishSelection(
          text.data,
          name === HostProperty.CLIPBOARD_TEXT_PRIMARY ? 'primary' : 'regular'
        );
        break;
      }
      case HostProperty.INPUT_FORWARDING: {
        const enabled = parseProperty(flagSchema, name, data);
        if (enabled !== null) {
          ctx.flags.forwarding = enabled;
          this.reevaluateDevices();
        }
        break;
      }
      case HostProperty.FORCE_GRAB_CURSOR: {
        const enabled = parseProperty(flagSchema, name, data);
        if (enabled !== null) {
          ctx.flags.forceGrab = enabled;
          this.reevaluateDevices();
        }
        break;
      }
    }
  }

  private reevaluateDevices(): void {
    this.pointer.reevaluate();
    this.clipboard.reevaluate();
  }

  private async connectWindowManager(): Promise<void> {
    const windowManager = this.ctx.windowManager;
    if (!windowManager) {
      console.log('[Bridge] No sway socket set, pointer warps will not be relayed to the host');
      return;
    }

    windowManager.onEvent = (event) => this.windowManagerQueue.push(event);
    windowManager.onError = (message) => this.windowManagerQueue.fail(message);
    try {
      await windowManager.connect();
    } catch (error) {
      console.error('[Bridge] sway IPC connection failed, pointer warps are disabled:', error);
      windowManager.onEvent = undefined;
      windowManager.onError = undefined;
      this.ctx.windowManager = null;
    }
  }

  private async readFlag(name: string, fallback: boolean): Promise<boolean> {
    try {
      const parsed = flagSchema.safeParse(await this.ctx.host.getProperty(name));
      if (parsed.success) {
        return parsed.data;
      }
      console.warn(`[Bridge] Unexpected ${name} format, using ${fallback}`);
    } catch (error) {
      console.warn(`[Bridge] Failed to read the ${name} property, using ${fallback}:`, error);
    }
    return fallback;
  }
}

/**
 * Validate a property payload. Unavailable properties (no data) are skipped
 * silently, malformed ones are logged.
 */
function parseProperty<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  name: string,
  data: unknown
): T | null {
  if (data === undefined || data === null) {
    return null;
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    console.warn(`[Bridge] Unexpected ${name} format`);
    return null;
  }
  return parsed.data;
}
