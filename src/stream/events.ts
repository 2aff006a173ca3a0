/**
 * Logical events recovered from the provider's SSE stream.
 *
 * The provider sends, in order: `message_start`, then per content block a
 * `content_block_start`, one or more `content_block_delta` and a
 * `content_block_stop`, then one or more `message_delta`, then `message_stop`.
 * `ping` and `error` may appear anywhere.
 */
export type StreamEvent =
  | MessageStartEvent
  | ContentBlockDeltaEvent
  | MessageDeltaEvent
  | MessageStopEvent
  | ErrorEvent
  | IgnoredEvent;

export interface MessageStartEvent {
  type: 'message_start';
  raw: unknown;
}

export interface ContentBlockDeltaEvent {
  type: 'content_block_delta';
  text: string;
}

export interface MessageDeltaEvent {
  type: 'message_delta';
  raw: unknown;
}

export interface MessageStopEvent {
  type: 'message_stop';
}

export interface ErrorEvent {
  type: 'error';
  /** Parsed JSON, or the undecoded text when the payload was not JSON */
  raw: unknown;
}

/**
 * A `data:` line under an event type that carries no text
 */
export interface IgnoredEvent {
  type: 'ignored';
  eventType: string;
  /** True for event types the protocol documents (`content_block_start`, `ping`, ...) */
  benign: boolean;
}

export type StreamEventListener = (event: StreamEvent) => void;

/**
 * Event types that are part of the protocol but carry nothing the client relays
 */
export const BENIGN_EVENT_TYPES: ReadonlySet<string> = new Set([
  'content_block_start',
  'content_block_stop',
  'ping',
]);
