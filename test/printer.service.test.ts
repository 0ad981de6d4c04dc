import { afterEach, describe, expect, it, vi } from 'vitest';

import { PrinterClient } from '../src/services/printer.service';
import { ServiceUnavailableError } from '../src/utils/errors';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('PrinterClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests the current boot log with the line count', async () => {
    const fetchMock = vi.fn(async () => jsonResponse(['Jun 5 14:22:01 printer01 idle']));
    vi.stubGlobal('fetch', fetchMock);

    const lines = await new PrinterClient('192.0.2.10').fetchLogLines(50);

    expect(lines).toEqual(['Jun 5 14:22:01 printer01 idle']);
    expect(fetchMock).toHaveBeenCalledWith(
      'http://192.0.2.10/api/v1/system/log?boot=0&lines=50',
      expect.objectContaining({ headers: { accept: 'application/json' } })
    );
  });

  it('drops items that are not strings', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(['first', 7, null, 'second'])));

    await expect(new PrinterClient('192.0.2.10').fetchLogLines(10)).resolves.toEqual(['first', 'second']);
  });

  it('reports a non-OK response as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ message: 'busy' }, 500)));

    const request = new PrinterClient('192.0.2.10').fetchLogLines(10);

    await expect(request).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(request).rejects.toThrow('Printer is unavailable: system log request failed (500)');
  });

  it('rejects a body that is not a list', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ lines: [] })));

    await expect(new PrinterClient('192.0.2.10').fetchLogLines(10)).rejects.toThrow(
      'Printer is unavailable: system log response is not a list'
    );
  });

  it('wraps network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(new PrinterClient('192.0.2.10').fetchLogLines(10)).rejects.toThrow(
      'Printer is unavailable: fetch failed'
    );
  });

  it('reports an aborted request as a timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new DOMException('This operation was aborted', 'AbortError');
      })
    );

    await expect(new PrinterClient('192.0.2.10', 250).fetchLogLines(10)).rejects.toThrow(
      'Printer is unavailable: timeout after 250ms'
    );
  });
});
