/**
 * Tracks remote outputs, seats and toplevel windows
 *
 * Resolves which output and seat carry the configured names and which window
 * is the current eligible (fullscreen) one. Dependents are notified through
 * hooks before any matched entry is released.
 */

import { Arena, Handle, sameHandle } from './Arena';
import { RemoteDisplay } from './remote/RemoteDisplay';
import { RemoteOutput, RemoteSeat, ToplevelWindow } from './types/BridgeState';
import { RemoteEventType, TrackerEvent } from './types/RemoteEvents';

export type OutputHandle = Handle<'output'>;
export type SeatHandle = Handle<'seat'>;
export type WindowHandle = Handle<'window'>;

export interface TrackerTargets {
  outputName: string;
  seatName: string;
  requireVisibleOnOutput: boolean;
}

export interface TrackerHooks {
  /** The matched output or seat was set, replaced or cleared */
  onMatchChanged(): void;
  /** The current eligible window was set, replaced or cleared */
  onCurrentWindowChanged(window: ToplevelWindow | null): void;
}

const FULLSCREEN_STATE = 'fullscreen';

export class ObjectTracker {
  private readonly outputs = new Arena<'output', RemoteOutput>('output');
  private readonly seats = new Arena<'seat', RemoteSeat>('seat');
  private readonly windows = new Arena<'window', ToplevelWindow>('window');

  private readonly outputHandles = new Map<number, OutputHandle>();
  private readonly seatHandles = new Map<number, SeatHandle>();
  private readonly windowHandles = new Map<number, WindowHandle>();

  private matchedOutputHandle: OutputHandle | null = null;
  private matchedSeatHandle: SeatHandle | null = null;
  private currentWindowHandle: WindowHandle | null = null;
  private _toplevelManagerFinished = false;

  constructor(
    private readonly targets: TrackerTargets,
    private readonly display: RemoteDisplay,
    private readonly hooks: TrackerHooks
  ) {}

  get matchedOutput(): OutputHandle | null {
    return this.matchedOutputHandle;
  }

  get matchedSeat(): SeatHandle | null {
    return this.matchedSeatHandle;
  }

  get toplevelManagerFinished(): boolean {
    return this._toplevelManagerFinished;
  }

  getOutput(handle: OutputHandle): RemoteOutput | undefined {
    return this.outputs.get(handle);
  }

  getSeat(handle: SeatHandle): RemoteSeat | undefined {
    return this.seats.get(handle);
  }

  getWindow(toplevelId: number): ToplevelWindow | undefined {
    const handle = this.windowHandles.get(toplevelId);
    return handle ? this.windows.get(handle) : undefined;
  }

  get currentWindow(): ToplevelWindow | null {
    if (!this.currentWindowHandle) {
      return null;
    }
    return this.windows.get(this.currentWindowHandle) ?? null;
  }

  get counts(): { outputs: number; seats: number; windows: number } {
    return { outputs: this.outputs.size, seats: this.seats.size, windows: this.windows.size };
  }

  /**
   * Apply one tracker notification from the remote
   */
  dispatch(event: TrackerEvent): void {
    switch (event.type) {
      case RemoteEventType.OUTPUT_ADDED:
        this.outputDiscovered(event.payload.id);
        break;
      case RemoteEventType.OUTPUT_NAME:
        this.outputNamed(event.payload.id, event.payload.name);
        break;
      case RemoteEventType.OUTPUT_REMOVED:
        this.outputRemoved(event.payload.id);
        break;
      case RemoteEventType.SEAT_ADDED:
        this.seatDiscovered(event.payload.id);
        break;
      case RemoteEventType.SEAT_NAME:
        this.seatNamed(event.payload.id, event.payload.name);
        break;
      case RemoteEventType.SEAT_REMOVED:
        this.seatRemoved(event.payload.id);
        break;
      case RemoteEventType.TOPLEVEL_ADDED:
        this.windowDiscovered(event.payload.toplevel);
        break;
      case RemoteEventType.TOPLEVEL_TITLE:
        this.updateWindow(event.payload.toplevel, (window) => {
          window.title = event.payload.title;
        });
        break;
      case RemoteEventType.TOPLEVEL_APP_ID:
        this.updateWindow(event.payload.toplevel, (window) => {
          window.appId = event.payload.appId;
        });
        break;
      case RemoteEventType.TOPLEVEL_OUTPUT_ENTER:
        this.windowOutputChanged(event.payload.toplevel, event.payload.output, true);
        break;
      case RemoteEventType.TOPLEVEL_OUTPUT_LEAVE:
        this.windowOutputChanged(event.payload.toplevel, event.payload.output, false);
        break;
      case RemoteEventType.TOPLEVEL_STATE:
        this.updateWindow(event.payload.toplevel, (window) => {
          window.fullscreen = event.payload.states.includes(FULLSCREEN_STATE);
        });
        break;
      case RemoteEventType.TOPLEVEL_DONE:
        this.windowCommitted(event.payload.toplevel);
        break;
      case RemoteEventType.TOPLEVEL_CLOSED:
        this.windowClosed(event.payload.toplevel);
        break;
      case RemoteEventType.TOPLEVEL_MANAGER_FINISHED:
        console.warn('[ObjectTracker] Remote finished the toplevel manager, window titles stop updating');
        this._toplevelManagerFinished = true;
        break;
    }
  }

  // Outputs

  outputDiscovered(id: number): void {
    if (this.outputHandles.has(id)) {
      console.warn(`[ObjectTracker] Output ${id} announced twice`);
      return;
    }
    this.outputHandles.set(id, this.outputs.insert({ id, name: null }));
  }

  /**
   * The most recently named output matching the configured name wins
   */
  outputNamed(id: number, name: string): void {
    const handle = this.outputHandles.get(id);
    const output = handle ? this.outputs.get(handle) : undefined;
    if (!handle || !output) {
      return;
    }

    output.name = name;
    if (name === this.targets.outputName) {
      if (!sameHandle(this.matchedOutputHandle, handle)) {
        this.setMatchedOutput(handle);
      }
    } else if (sameHandle(this.matchedOutputHandle, handle)) {
      this.setMatchedOutput(null);
    }
  }

  outputRemoved(id: number): void {
    const handle = this.outputHandles.get(id);
    if (!handle) {
      return;
    }

    if (sameHandle(this.matchedOutputHandle, handle)) {
      this.setMatchedOutput(null);
    }

    this.display.releaseOutput(id);
    this.outputs.remove(handle);
    this.outputHandles.delete(id);
  }

  /**
   * Output membership was recorded against the previous match, so every
   * window starts out not visible on the new one
   */
  private setMatchedOutput(handle: OutputHandle | null): void {
    this.matchedOutputHandle = handle;
    for (const windowHandle of this.windowHandles.values()) {
      const window = this.windows.get(windowHandle);
      if (window) {
        window.visibleOnRemoteOutput = false;
      }
    }
    this.hooks.onMatchChanged();
  }

  // Seats

  seatDiscovered(id: number): void {
    if (this.seatHandles.has(id)) {
      console.warn(`[ObjectTracker] Seat ${id} announced twice`);
      return;
    }
    this.seatHandles.set(id, this.seats.insert({ id, name: null }));
  }

  /**
   * The most recently named seat matching the configured name wins
   */
  seatNamed(id: number, name: string): void {
    const handle = this.seatHandles.get(id);
    const seat = handle ? this.seats.get(handle) : undefined;
    if (!handle || !seat) {
      return;
    }

    seat.name = name;
    if (name === this.targets.seatName) {
      if (!sameHandle(this.matchedSeatHandle, handle)) {
        this.matchedSeatHandle = handle;
        this.hooks.onMatchChanged();
      }
    } else if (sameHandle(this.matchedSeatHandle, handle)) {
      this.matchedSeatHandle = null;
      this.hooks.onMatchChanged();
    }
  }

  seatRemoved(id: number): void {
    const handle = this.seatHandles.get(id);
    if (!handle) {
      return;
    }

    if (sameHandle(this.matchedSeatHandle, handle)) {
      this.matchedSeatHandle = null;
      this.hooks.onMatchChanged();
    }

    this.display.releaseSeat(id);
    this.seats.remove(handle);
    this.seatHandles.delete(id);
  }

  // Windows

  windowDiscovered(toplevelId: number): void {
    if (this.windowHandles.has(toplevelId)) {
      console.warn(`[ObjectTracker] Toplevel ${toplevelId} announced twice`);
      return;
    }
    this.windowHandles.set(
      toplevelId,
      this.windows.insert({
        id: toplevelId,
        title: null,
        appId: null,
        visibleOnRemoteOutput: false,
        fullscreen: false,
      })
    );
  }

  isEligible(window: ToplevelWindow): boolean {
    // sway reports output_leave for floating fullscreen windows, so visibility
    // is opt-in
    if (this.targets.requireVisibleOnOutput && !window.visibleOnRemoteOutput) {
      return false;
    }
    return window.title !== null && window.appId !== null && window.fullscreen;
  }

  /**
   * Apply the eligibility predicate at the window's commit point
   */
  windowCommitted(toplevelId: number): void {
    const handle = this.windowHandles.get(toplevelId);
    const window = handle ? this.windows.get(handle) : undefined;
    if (!handle || !window) {
      return;
    }

    if (this.isEligible(window)) {
      if (!sameHandle(this.currentWindowHandle, handle)) {
        this.currentWindowHandle = handle;
        this.hooks.onCurrentWindowChanged(window);
      }
    } else if (sameHandle(this.currentWindowHandle, handle)) {
      this.currentWindowHandle = null;
      this.hooks.onCurrentWindowChanged(null);
    }
  }

  windowClosed(toplevelId: number): void {
    const handle = this.windowHandles.get(toplevelId);
    if (!handle) {
      return;
    }

    if (sameHandle(this.currentWindowHandle, handle)) {
      this.currentWindowHandle = null;
      this.hooks.onCurrentWindowChanged(null);
    }

    this.display.destroyToplevel(toplevelId);
    this.windows.remove(handle);
    this.windowHandles.delete(toplevelId);
  }

  /**
   * Release every tracked entry: outputs, then seats, then windows
   */
  destroyAll(): void {
    for (const id of [...this.outputHandles.keys()]) {
      this.outputRemoved(id);
    }
    for (const id of [...this.seatHandles.keys()]) {
      this.seatRemoved(id);
    }
    for (const id of [...this.windowHandles.keys()]) {
      this.windowClosed(id);
    }
  }

  private windowOutputChanged(toplevelId: number, outputId: number, entered: boolean): void {
    if (!this.matchedOutputHandle) {
      return;
    }
    const matched = this.outputs.get(this.matchedOutputHandle);
    if (!matched || matched.id !== outputId) {
      return;
    }
    this.updateWindow(toplevelId, (window) => {
      window.visibleOnRemoteOutput = entered;
    });
  }

  private updateWindow(toplevelId: number, update: (window: ToplevelWindow) => void): void {
    const window = this.getWindow(toplevelId);
    if (!window) {
      console.warn(`[ObjectTracker] Event for unknown toplevel ${toplevelId}`);
      return;
    }
    update(window);
  }
}
