export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface GenerationRequest {
  text: string;
  systemPrompt?: string;
  history?: ChatTurn[];
  signal?: AbortSignal;
}

export type ErrorCode =
  | 'NOT_CONFIGURED'
  | 'CONSENT_REQUIRED'
  | 'INVALID_CONFIG'
  | 'CONNECTIVITY'
  | 'TIMEOUT'
  | 'HTTP_STATUS'
  | 'PROTOCOL'
  | 'PROVIDER'
  | 'CREDENTIAL'
  | 'INTERNAL';

export type TextFragment = { kind: 'text'; text: string };
export type ErrorFragment = { kind: 'error'; code: ErrorCode; message: string };

/**
 * One unit of streamed output. A stream carries any number of text fragments
 * and at most one error fragment, which is always the last.
 */
export type StreamFragment = TextFragment | ErrorFragment;

export interface ProbeResult {
  ok: boolean;
  message: string;
}
