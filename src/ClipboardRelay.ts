import { randomBytes } from 'crypto';
import { sameHandle } from './Arena';
import { BridgeContext } from './BridgeContext';
import { SeatHandle } from './ObjectTracker';
import { HostProperty, clipboardPropertyFor } from './host/HostProperties';
import { SELECTION_KINDS, SelectionKind } from './types/BridgeState';
import { ClipboardEvent, RemoteEventType } from './types/RemoteEvents';

/**
 * UTF-8 or ambiguous plain-text MIME types, highest priority first
 */
export const TEXT_MIME_TYPES: readonly string[] = [
  'text/plain;charset=utf-8',
  'text/plain',
  'TEXT',
  'STRING',
  'UTF8_STRING',
];

/**
 * Payload served for the self-tag MIME type
 */
export const SELF_TAG_PAYLOAD = Buffer.from('mpv-wayland-remote', 'utf8');

/**
 * Generate the process-unique MIME type used to recognize our own offers
 */
export function createSelfTagMimeType(): string {
  return `x-mpv-wayland-remote-${randomBytes(4).toString('hex')}`;
}

interface ClipboardDevice {
  id: number;
  seat: SeatHandle;
}

interface SelectionSource {
  id: number;
  text: string;
}

interface IncomingOffer {
  id: number;
  /** Index into TEXT_MIME_TYPES of the best type announced so far */
  mimeIndex: number | null;
  ownOffer: boolean;
}

/**
 * Synchronizes the host's clipboard text with the remote selections.
 *
 * Every source we publish also offers a self-tag MIME type. When the remote
 * announces an offer carrying it, the offer is ours and is never read back,
 * otherwise the text would echo to the host and return as a new selection.
 *
 * Only one payload transfer is in flight at a time: the read of an offer
 * completes before any other remote event is handled.
 */
export class ClipboardRelay {
  private device: ClipboardDevice | null = null;
  private readonly sources: Record<SelectionKind, SelectionSource | null> = {
    regular: null,
    primary: null,
  };
  private offer: IncomingOffer | null = null;
  readonly offeredMimeTypes: readonly string[];

  constructor(
    private readonly ctx: BridgeContext,
    readonly selfTagMimeType: string = createSelfTagMimeType()
  ) {
    this.offeredMimeTypes = [selfTagMimeType, ...TEXT_MIME_TYPES];
  }

  get active(): boolean {
    return this.device !== null;
  }

  get deviceId(): number | null {
    return this.device?.id ?? null;
  }

  activeSourceId(kind: SelectionKind): number | null {
    return this.sources[kind]?.id ?? null;
  }

  shouldExist(): boolean {
    const { display, tracker, flags } = this.ctx;
    return display.capabilities.dataControl && tracker.matchedSeat !== null && flags.forwarding;
  }

  /**
   * Bring device existence and seat binding in line with the current state
   */
  reevaluate(): void {
    const shouldExist = this.shouldExist();

    if (this.device) {
      const rebound = !sameHandle(this.device.seat, this.ctx.tracker.matchedSeat);
      if (!shouldExist || rebound) {
        this.destroyDevice();
      }
    }

    if (shouldExist && !this.device) {
      this.createDevice();
    }
  }

  /**
   * Publish host clipboard text as the remote selection of the given kind
   */
  publishSelection(text: string | null | undefined, kind: SelectionKind): void {
    if (!this.device) {
      return;
    }
    const { display } = this.ctx;

    if (!text) {
      display.setSelection(this.device.id, null, kind);
      return;
    }

    const sourceId = display.createDataSource(this.offeredMimeTypes);
    const previous = this.sources[kind];
    this.sources[kind] = { id: sourceId, text };
    display.setSelection(this.device.id, sourceId, kind);

    // Released only after its replacement is installed
    if (previous) {
      display.destroyDataSource(previous.id);
    }
  }

  async handleEvent(event: ClipboardEvent): Promise<void> {
    switch (event.type) {
      case RemoteEventType.DATA_OFFER:
        this.offerAnnounced(event.payload.offer);
        break;
      case RemoteEventType.OFFER_MIME:
        this.offerMimeAnnounced(event.payload.offer, event.payload.mimeType);
        break;
      case RemoteEventType.SELECTION:
        await this.selectionCommitted(event.payload.offer, event.payload.kind);
        break;
      case RemoteEventType.DATA_DEVICE_FINISHED:
        console.warn('[ClipboardRelay] Remote finished the clipboard device');
        this.destroyDevice();
        break;
      case RemoteEventType.SOURCE_SEND:
        this.sourceSendRequested(
          event.payload.source,
          event.payload.mimeType,
          event.payload.transfer
        );
        break;
      case RemoteEventType.SOURCE_CANCELLED:
        this.sourceCancelled(event.payload.source);
        break;
    }
  }

  offerAnnounced(offerId: number): void {
    if (this.offer) {
      this.ctx.display.destroyOffer(this.offer.id);
    }
    this.offer = { id: offerId, mimeIndex: null, ownOffer: false };
  }

  offerMimeAnnounced(offerId: number, mimeType: string): void {
    const offer = this.offer;
    if (!offer || offer.id !== offerId) {
      console.warn(`[ClipboardRelay] MIME type for unexpected offer ${offerId}`);
      return;
    }

    if (offer.ownOffer) {
      return;
    }

    if (mimeType === this.selfTagMimeType) {
      offer.ownOffer = true;
      return;
    }

    const index = TEXT_MIME_TYPES.indexOf(mimeType);
    if (index !== -1 && (offer.mimeIndex === null || index < offer.mimeIndex)) {
      offer.mimeIndex = index;
    }
  }

  async selectionCommitted(offerId: number | null, kind: SelectionKind): Promise<void> {
    if (offerId === null) {
      if (this.offer) {
        this.ctx.display.destroyOffer(this.offer.id);
        this.offer = null;
      }
      await this.setHostSelection(kind, '');
      return;
    }

    const offer = this.offer;
    if (!offer || offer.id !== offerId) {
      console.warn(`[ClipboardRelay] Selection for unexpected offer ${offerId}`);
      return;
    }
    this.offer = null;

    try {
      if (!offer.ownOffer && offer.mimeIndex !== null) {
        await this.receiveOffer(offer.id, TEXT_MIME_TYPES[offer.mimeIndex], kind);
      }
    } finally {
      this.ctx.display.destroyOffer(offer.id);
    }
  }

  sourceSendRequested(sourceId: number, mimeType: string, transferId: number): void {
    const source = SELECTION_KINDS.map((kind) => this.sources[kind]).find(
      (candidate) => candidate?.id === sourceId
    );

    let data: Buffer | null = null;
    if (source) {
      if (TEXT_MIME_TYPES.includes(mimeType)) {
        data = Buffer.from(source.text, 'utf8');
      } else if (mimeType === this.selfTagMimeType) {
        data = SELF_TAG_PAYLOAD;
      }
    }

    this.ctx.display.sendSourceData(transferId, data);
  }

  sourceCancelled(sourceId: number): void {
    for (const kind of SELECTION_KINDS) {
      const source = this.sources[kind];
      if (source?.id === sourceId) {
        this.ctx.display.destroyDataSource(source.id);
        this.sources[kind] = null;
      }
    }
  }

  /**
   * Release sources, the pending offer and the device
   */
  destroy(): void {
    const { display } = this.ctx;
    for (const kind of SELECTION_KINDS) {
      const source = this.sources[kind];
      if (source) {
        display.destroyDataSource(source.id);
        this.sources[kind] = null;
      }
    }
    this.destroyDevice();
  }

  private async receiveOffer(offerId: number, mimeType: string, kind: SelectionKind): Promise<void> {
    let payload: Buffer;
    try {
      payload = await this.ctx.display.receive(offerId, mimeType);
    } catch (error) {
      console.error(`[ClipboardRelay] Failed to read the ${kind} selection:`, error);
      return;
    }

    await this.setHostSelection(kind, payload.toString('utf8'));
  }

  private async setHostSelection(kind: SelectionKind, text: string): Promise<void> {
    try {
      await this.ctx.host.setProperty(clipboardPropertyFor(kind), text);
    } catch (error) {
      console.error(`[ClipboardRelay] Failed to set the host ${kind} selection:`, error);
    }
  }

  private createDevice(): void {
    const { tracker, display, host } = this.ctx;
    const seatHandle = tracker.matchedSeat;
    const seat = seatHandle ? tracker.getSeat(seatHandle) : undefined;
    if (!seatHandle || !seat) {
      return;
    }

    const id = display.createDataDevice(seat.id);
    this.device = { id, seat: seatHandle };
    console.log(`[ClipboardRelay] Clipboard device bound to seat ${seat.name}`);

    for (const property of [HostProperty.CLIPBOARD_TEXT, HostProperty.CLIPBOARD_TEXT_PRIMARY]) {
      host.observeProperty(property).catch((error: unknown) => {
        console.error(`[ClipboardRelay] Failed to observe the ${property} property:`, error);
      });
    }
  }

  private destroyDevice(): void {
    if (!this.device) {
      return;
    }
    const { display, host } = this.ctx;

    if (this.offer) {
      display.destroyOffer(this.offer.id);
      this.offer = null;
    }
    display.destroyDataDevice(this.device.id);
    this.device = null;
    console.log('[ClipboardRelay] Clipboard device destroyed');

    for (const property of [HostProperty.CLIPBOARD_TEXT, HostProperty.CLIPBOARD_TEXT_PRIMARY]) {
      host.unobserveProperty(property).catch((error: unknown) => {
        console.error(`[ClipboardRelay] Failed to unobserve the ${property} property:`, error);
      });
    }
  }
}
