import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import { RELAY_CONFIG, RelayConfig } from '../../config/relay-config';
import {
  ChatOutcome,
  ChatRequest,
  ChatResponse,
  CompassError,
} from './compass.contracts';

/**
 * HTTP client for the BCN Art Compass backend.
 *
 * One POST per message, no retries. Failures come back as
 * `{ ok: false, error }` instead of being thrown; turning them into
 * user-facing text is left to the caller.
 */
@Injectable()
export class CompassClient {
  private readonly log = new Logger(CompassClient.name);
  readonly timeoutMs = 60_000;
  readonly chatUrl: string;

  constructor(@Inject(RELAY_CONFIG) cfg: RelayConfig) {
    this.chatUrl = `${cfg.apiBaseUrl.replace(/\/+$/, '')}/chat`;
  }

  async chat(userId: string, message: string): Promise<ChatOutcome> {
    const request: ChatRequest = { user_id: userId, message };

    try {
      const { data } = await axios.post<unknown>(this.chatUrl, request, {
        timeout: this.timeoutMs,
      });

      if (!this.isResponseBody(data)) {
        throw new CompassError(
          'INVALID_RESPONSE',
          'Response body is not a JSON object',
        );
      }

      const reply =
        typeof data.response === 'string' && data.response.length > 0
          ? data.response
          : null;
      const correlationId =
        typeof data.correlation_id === 'string' ? data.correlation_id : null;

      this.log.debug(
        `[chat] reply=${reply?.length ?? 0} chars correlation_id=${correlationId ?? '-'}`,
      );
      return { ok: true, reply, correlationId };
    } catch (err) {
      const error = this.toCompassError(err);
      this.log.error(
        `Error calling BCN Art Compass API (${error.code}): ${error.message}`,
        err instanceof Error ? err.stack : undefined,
      );
      return { ok: false, error };
    }
  }

  private isResponseBody(data: unknown): data is Partial<Record<keyof ChatResponse, unknown>> {
    return typeof data === 'object' && data !== null && !Array.isArray(data);
  }

  private toCompassError(err: unknown): CompassError {
    if (err instanceof CompassError) return err;

    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      if (status !== undefined) {
        return new CompassError(
          'HTTP_ERROR',
          `Backend responded with status ${status}`,
          status,
        );
      }
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return new CompassError(
          'TIMEOUT',
          `No response within ${this.timeoutMs}ms`,
        );
      }
      return new CompassError('NETWORK_ERROR', err.message);
    }

    return new CompassError(
      'UNEXPECTED',
      err instanceof Error ? err.message : String(err),
    );
  }
}
