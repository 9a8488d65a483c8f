/**
 * Shared state types for the bridge
 *
 * Entries tracked for the remote session, host-side metrics and flags,
 * and the error type raised during setup.
 */

/**
 * Error codes for fatal bridge errors
 */
export enum BridgeErrorCode {
  MISSING_CONFIG = 'MISSING_CONFIG',
  CONNECT_FAILED = 'CONNECT_FAILED',
  MISSING_CAPABILITY = 'MISSING_CAPABILITY',
  HOST_REQUEST_FAILED = 'HOST_REQUEST_FAILED',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
}

/**
 * Error raised by setup and by the collaborator adapters
 */
export class BridgeError extends Error {
  constructor(
    public readonly code: BridgeErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

/**
 * Clipboard selection kind (regular clipboard or select-and-paste primary)
 */
export type SelectionKind = 'regular' | 'primary';

export const SELECTION_KINDS: readonly SelectionKind[] = ['regular', 'primary'];

/**
 * Remote output, discovered through the registry. The name arrives later.
 */
export interface RemoteOutput {
  id: number;
  name: string | null;
}

/**
 * Remote seat, discovered through the registry
 */
export interface RemoteSeat {
  id: number;
  name: string | null;
}

/**
 * Remote toplevel window reported by the window-management channel
 */
export interface ToplevelWindow {
  id: number;
  title: string | null;
  appId: string | null;
  visibleOnRemoteOutput: boolean;
  fullscreen: boolean;
}

/**
 * On-screen rectangle the host renders video into, with letterbox margins
 */
export interface DrawingAreaMetrics {
  w: number;
  h: number;
  ml: number;
  mr: number;
  mt: number;
  mb: number;
}

/**
 * Native pixel size of the decoded video
 */
export interface VideoMetrics {
  w: number;
  h: number;
}

/**
 * Host-controlled toggles
 */
export interface EnabledFlags {
  forwarding: boolean;
  forceGrab: boolean;
}

/**
 * Layout-space origin of the remote output in the window manager
 */
export interface OutputLayoutOrigin {
  x: number;
  y: number;
}

export interface Point {
  x: number;
  y: number;
}
