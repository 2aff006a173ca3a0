export type Role = 'user' | 'assistant';

export interface ChatMessage {
  role: Role;
  content: string;
}

/**
 * Body of a streaming Messages API request, in wire shape
 */
export interface RequestPayload {
  system: string;
  messages: ChatMessage[];
  model: string;
  temperature: number;
  stream: true;
  max_tokens: number;
}

/**
 * How to launch the transport process for one request
 */
export interface TransportArgs {
  readonly command: string;
  /** Full argv; the target URL is always the last element */
  readonly args: readonly string[];
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

export interface BuiltRequest {
  readonly payload: RequestPayload;
  readonly transport: TransportArgs;
}

/**
 * Append-only text sink used for debug dumps
 */
export interface DebugSink {
  write(text: string): void;
}
