import { describe, expect, it } from 'vitest';

import {
  extractDetails,
  maskVariables,
  matchPattern,
  normalizePattern,
} from '../src/core/pattern-normalizer';

const EXTRUSION = 'PrintCore 0 extruded 12.3 mm in 1.1 s, remaining length = 800 mm';

describe('normalizePattern', () => {
  it('summarizes PrintCore extrusion updates per core', () => {
    expect(normalizePattern(EXTRUSION)).toBe('PrintCore 0 extrusion update');
    expect(normalizePattern('PrintCore 1 extruded 0.4 mm in 2.0 s, remaining length = 12 mm')).toBe(
      'PrintCore 1 extrusion update'
    );
  });

  it('keeps the client of MJPG-streamer lines in the pattern but not in the bucket', () => {
    const match = matchPattern('MJPG-streamer [611]: serving client: 10.0.0.2');

    expect(match).toEqual({
      rule: 'mjpg-client',
      pattern: 'MJPG-streamer serving client: 10.0.0.2',
      bucket: 'MJPG-streamer serving client',
    });
  });

  it('falls back to the bare MJPG pattern when no client follows', () => {
    expect(normalizePattern('MJPG-streamer [611]: serving client')).toBe('MJPG-streamer serving client');
  });

  it('recognizes NFC tag queue and write lines', () => {
    expect(normalizePattern('Queueing tag for hotend 1 write')).toBe('NFC tag queue update for hotend 1');
    expect(normalizePattern('Writing tag to hotend index # 0')).toBe('NFC tag write for hotend 0');
    expect(normalizePattern('Writing tag to spool')).toBe('NFC tag write');
  });

  it('masks PIDs, clock times, IPs and UUIDs in everything else', () => {
    const message =
      'PrinterService[812]: connection from 192.168.1.20 at 14:22:01 job 123e4567-e89b-12d3-a456-426614174000';

    expect(normalizePattern(message)).toBe('PrinterService[PID]: connection from IP at TIME job UUID');
    expect(matchPattern(message).rule).toBe('generic');
  });

  it('leaves bare numbers alone', () => {
    expect(maskVariables('Fan 2 at 45% for 30 s')).toBe('Fan 2 at 45% for 30 s');
  });
});

describe('extractDetails', () => {
  it('formats extrusion statistics', () => {
    expect(extractDetails(EXTRUSION, 'PrintCore 0 extrusion update')).toBe(
      'Core 0: 12.3mm in 1.1s (800mm remaining)'
    );
  });

  it('returns the MJPG client token', () => {
    const message = 'MJPG-streamer [611]: serving client: 10.0.0.5';
    expect(extractDetails(message, normalizePattern(message))).toBe('10.0.0.5');
  });

  it('returns nothing for generic messages or a mismatched pattern', () => {
    expect(extractDetails('PrinterService[812]: idle', 'PrinterService[PID]: idle')).toBeUndefined();
    expect(extractDetails(EXTRUSION, 'something else')).toBeUndefined();
  });

  it('returns nothing when an extrusion line does not follow the full grammar', () => {
    const message = 'PrintCore 1 extruded some filament';
    expect(extractDetails(message, normalizePattern(message))).toBeUndefined();
  });
});
