/**
 * Process-wide bridge state, constructed once at startup and handed to every
 * component.
 */

import { BridgeConfig } from './config';
import { ObjectTracker, TrackerHooks } from './ObjectTracker';
import { HostBus } from './host/HostBus';
import { RemoteDisplay } from './remote/RemoteDisplay';
import { DrawingAreaMetrics, EnabledFlags, VideoMetrics } from './types/BridgeState';
import { WindowManagerIpc } from './wm/WindowManagerIpc';

export type ContextConfig = Pick<
  BridgeConfig,
  'displayName' | 'outputName' | 'seatName' | 'requireVisibleOnOutput'
>;

export class BridgeContext {
  readonly flags: EnabledFlags = { forwarding: true, forceGrab: false };
  drawingArea: DrawingAreaMetrics = { w: 0, h: 0, ml: 0, mr: 0, mt: 0, mb: 0 };
  video: VideoMetrics = { w: 0, h: 0 };
  readonly tracker: ObjectTracker;

  constructor(
    readonly config: ContextConfig,
    readonly display: RemoteDisplay,
    readonly host: HostBus,
    public windowManager: WindowManagerIpc | null,
    hooks: TrackerHooks
  ) {
    this.tracker = new ObjectTracker(config, display, hooks);
  }
}
