import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SSEEventParser } from '../parser.js';
import type { StreamEvent } from '../events.js';
import { DecodeError } from '../../errors/categories.js';
import type { Logger } from '../../observability/logging.js';
import { sseTextStream } from '../../__mocks__/index.js';

function createSpyLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe('SSEEventParser', () => {
  let events: StreamEvent[];
  let logger: ReturnType<typeof createSpyLogger>;
  let parser: SSEEventParser;

  beforeEach(() => {
    events = [];
    logger = createSpyLogger();
    parser = new SSEEventParser({ onEvent: (event) => events.push(event), logger });
  });

  describe('content_block_delta', () => {
    it('emits the delta text unmodified', () => {
      parser.feedLine('event: content_block_delta');

      const fragments = parser.feedLine('data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"  two\\nlines "}}');

      expect(fragments).toEqual(['  two\nlines ']);
      expect(events).toEqual([{ type: 'content_block_delta', text: '  two\nlines ' }]);
    });

    it('emits nothing when the delta has no text field', () => {
      parser.feedLine('event: content_block_delta');

      expect(parser.feedLine('data: {"delta":{"type":"input_json_delta","partial_json":"{}"}}')).toEqual([]);
      expect(parser.feedLine('data: {"index":0}')).toEqual([]);
      expect(events).toEqual([]);
    });

    it('emits nothing when delta.text is not a string', () => {
      parser.feedLine('event: content_block_delta');

      expect(parser.feedLine('data: {"delta":{"text":42}}')).toEqual([]);
    });

    it('drops malformed JSON without throwing and reports a DecodeError', () => {
      const onDecodeError = vi.fn();
      parser = new SSEEventParser({ logger, onDecodeError });
      parser.feedLine('event: content_block_delta');

      expect(() => parser.feedLine('data: {"delta":{"text":')).not.toThrow();
      expect(parser.feedLine('data: not json')).toEqual([]);

      expect(onDecodeError).toHaveBeenCalledTimes(2);
      expect(onDecodeError.mock.calls[0][0]).toBeInstanceOf(DecodeError);
      expect(logger.warn).toHaveBeenCalledWith(
        'Failed to decode content_block_delta payload',
        expect.objectContaining({ type: 'decode_error' })
      );
    });

    it('keeps parsing after a malformed line', () => {
      parser.feedLine('event: content_block_delta');
      parser.feedLine('data: {oops');

      expect(parser.feedLine('data: {"delta":{"text":"ok"}}')).toEqual(['ok']);
    });
  });

  describe('event type tracking', () => {
    it('ignores the message_start payload and emits the following delta', () => {
      const lines = [
        'event: message_start',
        'data: {"type":"message_start","message":{"id":"msg_1"}}',
        'event: content_block_delta',
        'data: {"delta":{"text":"hi"}}',
      ];

      const perLine = lines.map(line => parser.feedLine(line));

      expect(perLine).toEqual([[], [], [], ['hi']]);
    });

    it('applies one event type to several consecutive data lines', () => {
      parser.feedLine('event: content_block_delta');

      expect(parser.feedLine('data: {"delta":{"text":"a"}}')).toEqual(['a']);
      expect(parser.feedLine('data: {"delta":{"text":"b"}}')).toEqual(['b']);
      expect(parser.eventType).toBe('content_block_delta');
    });

    it('drops data lines that arrive before any event line', () => {
      expect(parser.feedLine('data: {"delta":{"text":"early"}}')).toEqual([]);
      expect(events).toEqual([]);
      expect(parser.eventType).toBeUndefined();
    });

    it('switches interpretation at the next event line', () => {
      parser.feedLine('event: content_block_delta');
      parser.feedLine('event: message_delta');

      expect(parser.feedLine('data: {"delta":{"text":"not text"}}')).toEqual([]);
      expect(events).toEqual([{ type: 'message_delta', raw: { delta: { text: 'not text' } } }]);
    });

    it('treats blank lines as no-ops that keep the current event type', () => {
      parser.feedLine('event: content_block_delta');

      expect(parser.feedLine('')).toEqual([]);
      expect(parser.eventType).toBe('content_block_delta');
    });

    it('ignores lines of any other shape', () => {
      parser.feedLine('event: content_block_delta');

      expect(parser.feedLine(': keep-alive comment')).toEqual([]);
      expect(parser.feedLine('data:{"delta":{"text":"no space"}}')).toEqual([]);
      expect(parser.feedLine('{"type":"error"}')).toEqual([]);
      expect(parser.eventType).toBe('content_block_delta');
    });

    it('strips a trailing carriage return', () => {
      expect(parser.feedLine('event: content_block_delta\r')).toEqual([]);
      expect(parser.feedLine('data: {"delta":{"text":"crlf"}}\r')).toEqual(['crlf']);
    });

    it('forgets the event type on reset', () => {
      parser.feedLine('event: content_block_delta');
      parser.reset();

      expect(parser.feedLine('data: {"delta":{"text":"x"}}')).toEqual([]);
    });
  });

  describe('diagnostic events', () => {
    it('surfaces message_start and message_delta payloads as raw JSON', () => {
      parser.feedLine('event: message_start');
      parser.feedLine('data: {"message":{"id":"msg_1"}}');
      parser.feedLine('event: message_delta');
      parser.feedLine('data: {"delta":{"stop_reason":"end_turn"}}');

      expect(events).toEqual([
        { type: 'message_start', raw: { message: { id: 'msg_1' } } },
        { type: 'message_delta', raw: { delta: { stop_reason: 'end_turn' } } },
      ]);
    });

    it('surfaces message_stop', () => {
      parser.feedLine('event: message_stop');

      expect(parser.feedLine('data: {"type":"message_stop"}')).toEqual([]);
      expect(events).toEqual([{ type: 'message_stop' }]);
    });

    it('surfaces provider errors distinctly and logs them', () => {
      parser.feedLine('event: error');
      const fragments = parser.feedLine('data: {"type":"error","error":{"type":"overloaded_error","message":"Overloaded"}}');

      expect(fragments).toEqual([]);
      expect(events).toEqual([
        { type: 'error', raw: { type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } } },
      ]);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('keeps the undecoded text of a malformed error payload', () => {
      parser.feedLine('event: error');
      parser.feedLine('data: upstream exploded');

      expect(events).toEqual([{ type: 'error', raw: 'upstream exploded' }]);
    });

    it('marks documented event types as benign and logs unknown ones as warnings', () => {
      parser.feedLine('event: ping');
      parser.feedLine('data: {"type":"ping"}');
      parser.feedLine('event: brand_new_event');
      parser.feedLine('data: {}');

      expect(events).toEqual([
        { type: 'ignored', eventType: 'ping', benign: true },
        { type: 'ignored', eventType: 'brand_new_event', benign: false },
      ]);
      expect(logger.warn).toHaveBeenCalledWith('Unrecognised event type', { eventType: 'brand_new_event' });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  it('recovers the full text of a complete stream', () => {
    const text = sseTextStream(['Hel', 'lo', ' world'])
      .flatMap(line => parser.feedLine(line))
      .join('');

    expect(text).toBe('Hello world');
  });

  it('keeps state per instance', () => {
    const other = new SSEEventParser();
    parser.feedLine('event: content_block_delta');

    expect(other.feedLine('data: {"delta":{"text":"leak"}}')).toEqual([]);
    expect(parser.feedLine('data: {"delta":{"text":"mine"}}')).toEqual(['mine']);
  });
});
