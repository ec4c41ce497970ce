/**
 * Request Tracker
 * One pending completion per outstanding control exchange, settled by the
 * dispatch loop, a timeout or link loss, whichever comes first.
 */

import { MEASUREMENT_NAMES, OPCODE_NAMES } from './PmdConstants';
import { ControlResponse, RequestToken } from './PmdTypes';
import { DeviceStatusError, ProtocolError } from './PmdErrors';
import { PmdLogger, pmdLogger } from './PmdLogger';

interface PendingRequest {
  token: RequestToken;
  resolve: (response: ControlResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class RequestTracker {
  private pending = new Map<string, PendingRequest>();

  constructor(private readonly logger: PmdLogger = pmdLogger) {}

  /**
   * Waits for the response to a token. Rejects with ProtocolError Timeout after
   * timeoutMs, calling onTimeout first so the exchange can be abandoned.
   */
  track(token: RequestToken, timeoutMs: number, onTimeout: (token: RequestToken) => void): Promise<ControlResponse> {
    return new Promise<ControlResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(token.id);
        onTimeout(token);
        this.logger.warn(`${OPCODE_NAMES[token.opcode]} ${MEASUREMENT_NAMES[token.measurement]} timed out`, { timeoutMs }, 'REQUEST');
        reject(new ProtocolError(
          'Timeout',
          `${OPCODE_NAMES[token.opcode]} ${MEASUREMENT_NAMES[token.measurement]} not answered within ${timeoutMs}ms`
        ));
      }, timeoutMs);

      this.pending.set(token.id, { token, resolve, reject, timer });
    });
  }

  /**
   * Resolves on Success, rejects with DeviceStatusError otherwise.
   * @returns false if nothing was waiting on the token
   */
  settle(token: RequestToken, response: ControlResponse): boolean {
    const entry = this.take(token);
    if (!entry) return false;

    if (response.status.name === 'Success') {
      entry.resolve(response);
    } else {
      entry.reject(new DeviceStatusError(response));
    }
    return true;
  }

  cancel(token: RequestToken, error: Error): boolean {
    const entry = this.take(token);
    if (!entry) return false;

    entry.reject(error);
    return true;
  }

  rejectAll(error: Error): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
      entry.reject(error);
    }
    this.pending.clear();
  }

  size(): number {
    return this.pending.size;
  }

  private take(token: RequestToken): PendingRequest | undefined {
    const entry = this.pending.get(token.id);
    if (entry) {
      clearTimeout(entry.timer);
      this.pending.delete(token.id);
    }
    return entry;
  }
}
