// ============ /chat ============

export interface ChatRequest {
  user_id: string;
  message: string;
}

export interface ChatResponse {
  response: string;
  correlation_id: string;
}

// ============ Outcome ============

export type ChatOutcome =
  | { ok: true; reply: string | null; correlationId: string | null }
  | { ok: false; error: CompassError };

// ============ Error Codes ============

export type CompassErrorCode =
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE'
  | 'UNEXPECTED';

export class CompassError extends Error {
  constructor(
    public readonly code: CompassErrorCode,
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'CompassError';
  }
}
