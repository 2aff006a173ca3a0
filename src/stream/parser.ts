import { DecodeError } from '../errors/categories.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { BENIGN_EVENT_TYPES, type StreamEvent, type StreamEventListener } from './events.js';

const EVENT_PREFIX = 'event: ';
const DATA_PREFIX = 'data: ';

export interface SSEEventParserOptions {
  /** Receives every recognised event, including the text deltas */
  onEvent?: StreamEventListener;
  onDecodeError?: (error: DecodeError) => void;
  logger?: Logger;
}

type Decoded = { ok: true; value: unknown } | { ok: false; error: DecodeError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Line-oriented SSE decoder for one stream.
 *
 * The only state is the type named by the most recent `event:` line; it
 * applies to every following `data:` line until the next `event:` line.
 * Create one parser per stream.
 */
export class SSEEventParser {
  private currentEventType: string | undefined;
  private readonly onEvent?: StreamEventListener;
  private readonly onDecodeError?: (error: DecodeError) => void;
  private readonly logger: Logger;

  constructor(options: SSEEventParserOptions = {}) {
    this.onEvent = options.onEvent;
    this.onDecodeError = options.onDecodeError;
    this.logger = options.logger ?? new NoopLogger();
  }

  get eventType(): string | undefined {
    return this.currentEventType;
  }

  /**
   * Feeds one line of output, without its terminator, and returns the text
   * fragments it carries (usually none or one). Never throws.
   */
  feedLine(rawLine: string): string[] {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    if (line.length === 0) {
      return [];
    }

    if (line.startsWith(EVENT_PREFIX)) {
      this.currentEventType = line.slice(EVENT_PREFIX.length).trim();
      return [];
    }

    if (!line.startsWith(DATA_PREFIX)) {
      return [];
    }

    // data before any event line has nothing to be interpreted against
    if (this.currentEventType === undefined) {
      return [];
    }

    return this.handleData(this.currentEventType, line.slice(DATA_PREFIX.length));
  }

  reset(): void {
    this.currentEventType = undefined;
  }

  private handleData(eventType: string, data: string): string[] {
    switch (eventType) {
      case 'content_block_delta': {
        const decoded = this.decode(eventType, data);
        if (!decoded.ok) return [];

        const delta = isRecord(decoded.value) ? decoded.value.delta : undefined;
        if (!isRecord(delta) || typeof delta.text !== 'string') {
          this.logger.trace('Delta without text', { data });
          return [];
        }
        this.emit({ type: 'content_block_delta', text: delta.text });
        return [delta.text];
      }

      case 'message_start':
      case 'message_delta': {
        const decoded = this.decode(eventType, data);
        if (decoded.ok) {
          this.emit({ type: eventType, raw: decoded.value });
        }
        return [];
      }

      case 'message_stop':
        this.emit({ type: 'message_stop' });
        return [];

      case 'error': {
        const decoded = this.decode(eventType, data);
        const raw = decoded.ok ? decoded.value : data;
        this.logger.error('Provider reported a stream error', { raw });
        this.emit({ type: 'error', raw });
        return [];
      }

      default: {
        const benign = BENIGN_EVENT_TYPES.has(eventType);
        if (benign) {
          this.logger.trace('Ignoring event', { eventType });
        } else {
          this.logger.warn('Unrecognised event type', { eventType });
        }
        this.emit({ type: 'ignored', eventType, benign });
        return [];
      }
    }
  }

  private decode(eventType: string, data: string): Decoded {
    try {
      return { ok: true, value: JSON.parse(data) };
    } catch (error) {
      const decodeError = new DecodeError(eventType, data, error instanceof Error ? error : undefined);
      this.logger.warn(decodeError.message, decodeError.toJSON());
      this.onDecodeError?.(decodeError);
      return { ok: false, error: decodeError };
    }
  }

  private emit(event: StreamEvent): void {
    this.onEvent?.(event);
  }
}
