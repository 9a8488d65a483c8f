/**
 * Host property bus interface - the media player's key/value property channel
 */

export enum HostEventType {
  PROPERTY_CHANGE = 'PROPERTY_CHANGE',
  SHUTDOWN = 'SHUTDOWN',
}

export interface PropertyChangeEvent {
  type: HostEventType.PROPERTY_CHANGE;
  /** data is undefined when the property is unavailable */
  payload: { name: string; data: unknown };
}

export interface ShutdownEvent {
  type: HostEventType.SHUTDOWN;
}

export type HostEvent = PropertyChangeEvent | ShutdownEvent;

/**
 * Interface for host property bus connections
 *
 * Implemented by:
 * - MpvIpcClient (mpv JSON IPC over a UNIX socket)
 */
export interface HostBus {
  readonly connected: boolean;

  onEvent?: (event: HostEvent) => void;
  onError?: (message: string) => void;

  connect(): Promise<void>;

  getProperty(name: string): Promise<unknown>;

  setProperty(name: string, value: unknown): Promise<void>;

  /**
   * Start receiving change events for a property. The current value is
   * delivered as the first change event.
   */
  observeProperty(name: string): Promise<void>;

  unobserveProperty(name: string): Promise<void>;

  disconnect(): void;
}
