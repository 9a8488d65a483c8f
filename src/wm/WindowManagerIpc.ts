/**
 * Window-manager IPC interface - output layout queries and warp notifications
 */

export interface LayoutRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LayoutOutput {
  name: string;
  rect: LayoutRect;
}

export enum WindowManagerEventType {
  OUTPUT = 'OUTPUT',
  CURSOR_WARP = 'CURSOR_WARP',
  SHUTDOWN = 'SHUTDOWN',
}

export interface OutputChangedEvent {
  type: WindowManagerEventType.OUTPUT;
}

export interface CursorWarpEvent {
  type: WindowManagerEventType.CURSOR_WARP;
  payload: { lx: number; ly: number };
}

export interface WindowManagerShutdownEvent {
  type: WindowManagerEventType.SHUTDOWN;
}

export type WindowManagerEvent = OutputChangedEvent | CursorWarpEvent | WindowManagerShutdownEvent;

/**
 * Interface for window-manager IPC connections
 *
 * Implemented by:
 * - SwayIpcClient (sway IPC over a UNIX socket)
 */
export interface WindowManagerIpc {
  readonly connected: boolean;

  onEvent?: (event: WindowManagerEvent) => void;
  onError?: (message: string) => void;

  /**
   * Connect and subscribe to output, cursor-warp and shutdown events
   */
  connect(): Promise<void>;

  getOutputs(): Promise<LayoutOutput[]>;

  disconnect(): void;
}
