import { SelectionKind } from './BridgeState';

export enum RemoteEventType {
  OUTPUT_ADDED = 'OUTPUT_ADDED',
  OUTPUT_NAME = 'OUTPUT_NAME',
  OUTPUT_REMOVED = 'OUTPUT_REMOVED',
  SEAT_ADDED = 'SEAT_ADDED',
  SEAT_NAME = 'SEAT_NAME',
  SEAT_REMOVED = 'SEAT_REMOVED',
  TOPLEVEL_ADDED = 'TOPLEVEL_ADDED',
  TOPLEVEL_TITLE = 'TOPLEVEL_TITLE',
  TOPLEVEL_APP_ID = 'TOPLEVEL_APP_ID',
  TOPLEVEL_OUTPUT_ENTER = 'TOPLEVEL_OUTPUT_ENTER',
  TOPLEVEL_OUTPUT_LEAVE = 'TOPLEVEL_OUTPUT_LEAVE',
  TOPLEVEL_STATE = 'TOPLEVEL_STATE',
  TOPLEVEL_DONE = 'TOPLEVEL_DONE',
  TOPLEVEL_CLOSED = 'TOPLEVEL_CLOSED',
  TOPLEVEL_MANAGER_FINISHED = 'TOPLEVEL_MANAGER_FINISHED',
  DATA_OFFER = 'DATA_OFFER',
  OFFER_MIME = 'OFFER_MIME',
  SELECTION = 'SELECTION',
  DATA_DEVICE_FINISHED = 'DATA_DEVICE_FINISHED',
  SOURCE_SEND = 'SOURCE_SEND',
  SOURCE_CANCELLED = 'SOURCE_CANCELLED',
}

export interface OutputAddedEvent {
  type: RemoteEventType.OUTPUT_ADDED;
  payload: { id: number };
}

export interface OutputNameEvent {
  type: RemoteEventType.OUTPUT_NAME;
  payload: { id: number; name: string };
}

export interface OutputRemovedEvent {
  type: RemoteEventType.OUTPUT_REMOVED;
  payload: { id: number };
}

export interface SeatAddedEvent {
  type: RemoteEventType.SEAT_ADDED;
  payload: { id: number };
}

export interface SeatNameEvent {
  type: RemoteEventType.SEAT_NAME;
  payload: { id: number; name: string };
}

export interface SeatRemovedEvent {
  type: RemoteEventType.SEAT_REMOVED;
  payload: { id: number };
}

export interface ToplevelAddedEvent {
  type: RemoteEventType.TOPLEVEL_ADDED;
  payload: { toplevel: number };
}

export interface ToplevelTitleEvent {
  type: RemoteEventType.TOPLEVEL_TITLE;
  payload: { toplevel: number; title: string };
}

export interface ToplevelAppIdEvent {
  type: RemoteEventType.TOPLEVEL_APP_ID;
  payload: { toplevel: number; appId: string };
}

export interface ToplevelOutputEnterEvent {
  type: RemoteEventType.TOPLEVEL_OUTPUT_ENTER;
  payload: { toplevel: number; output: number };
}

export interface ToplevelOutputLeaveEvent {
  type: RemoteEventType.TOPLEVEL_OUTPUT_LEAVE;
  payload: { toplevel: number; output: number };
}

export interface ToplevelStateEvent {
  type: RemoteEventType.TOPLEVEL_STATE;
  payload: { toplevel: number; states: string[] };
}

export interface ToplevelDoneEvent {
  type: RemoteEventType.TOPLEVEL_DONE;
  payload: { toplevel: number };
}

export interface ToplevelClosedEvent {
  type: RemoteEventType.TOPLEVEL_CLOSED;
  payload: { toplevel: number };
}

export interface ToplevelManagerFinishedEvent {
  type: RemoteEventType.TOPLEVEL_MANAGER_FINISHED;
}

export interface DataOfferEvent {
  type: RemoteEventType.DATA_OFFER;
  payload: { offer: number };
}

export interface OfferMimeEvent {
  type: RemoteEventType.OFFER_MIME;
  payload: { offer: number; mimeType: string };
}

export interface SelectionEvent {
  type: RemoteEventType.SELECTION;
  payload: { offer: number | null; kind: SelectionKind };
}

export interface DataDeviceFinishedEvent {
  type: RemoteEventType.DATA_DEVICE_FINISHED;
}

export interface SourceSendEvent {
  type: RemoteEventType.SOURCE_SEND;
  payload: { source: number; mimeType: string; transfer: number };
}

export interface SourceCancelledEvent {
  type: RemoteEventType.SOURCE_CANCELLED;
  payload: { source: number };
}

export type TrackerEvent =
  | OutputAddedEvent
  | OutputNameEvent
  | OutputRemovedEvent
  | SeatAddedEvent
  | SeatNameEvent
  | SeatRemovedEvent
  | ToplevelAddedEvent
  | ToplevelTitleEvent
  | ToplevelAppIdEvent
  | ToplevelOutputEnterEvent
  | ToplevelOutputLeaveEvent
  | ToplevelStateEvent
  | ToplevelDoneEvent
  | ToplevelClosedEvent
  | ToplevelManagerFinishedEvent;

export type ClipboardEvent =
  | DataOfferEvent
  | OfferMimeEvent
  | SelectionEvent
  | DataDeviceFinishedEvent
  | SourceSendEvent
  | SourceCancelledEvent;

export type RemoteEvent = TrackerEvent | ClipboardEvent;

const CLIPBOARD_EVENT_TYPES: ReadonlySet<RemoteEventType> = new Set([
  RemoteEventType.DATA_OFFER,
  RemoteEventType.OFFER_MIME,
  RemoteEventType.SELECTION,
  RemoteEventType.DATA_DEVICE_FINISHED,
  RemoteEventType.SOURCE_SEND,
  RemoteEventType.SOURCE_CANCELLED,
]);

export function isClipboardEvent(event: RemoteEvent): event is ClipboardEvent {
  return CLIPBOARD_EVENT_TYPES.has(event.type);
}
