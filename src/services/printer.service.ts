/**
 * Printer Service - system log access on the printer controller REST API
 */

import { APIError, ServiceUnavailableError } from '../utils/errors';

/**
 * Anything that can hand over a batch of raw log lines
 */
export interface LogSource {
  describe(): string;
  fetchLogLines(count: number): Promise<string[]>;
}

export class PrinterClient implements LogSource {
  constructor(
    private readonly printerIp: string,
    private readonly timeoutMs: number = 5000
  ) {}

  describe(): string {
    return `http://${this.printerIp}`;
  }

  /**
   * Fetch the last `count` lines of the current boot's system log
   */
  async fetchLogLines(count: number): Promise<string[]> {
    const url = `${this.describe()}/api/v1/system/log?boot=0&lines=${count}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: { accept: 'application/json' },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ServiceUnavailableError('Printer', `system log request failed (${response.status})`);
      }

      const body: unknown = await response.json();
      if (!Array.isArray(body)) {
        throw new ServiceUnavailableError('Printer', 'system log response is not a list');
      }

      return body.filter((line): line is string => typeof line === 'string');
    } catch (error) {
      if (error instanceof APIError) throw error;

      const reason =
        error instanceof Error && error.name === 'AbortError'
          ? `timeout after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new ServiceUnavailableError('Printer', reason);
    } finally {
      clearTimeout(timeout);
    }
  }
}
