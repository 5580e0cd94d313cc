/**
 * Unit tests for CLI output helpers
 * @module @faultline/cli/tests/unit/output
 */

import { stripVTControlCharacters } from 'node:util';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatOffset, isOutputFormat, setOutputFormat, statusBadge, table, truncate } from '../../src/output.js';

describe('output', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setOutputFormat('table');
  });

  it('should recognise output formats', () => {
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('plain')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
    expect(isOutputFormat(undefined)).toBe(false);
  });

  it('should truncate long strings with an ellipsis', () => {
    expect(truncate('network-faults', 20)).toBe('network-faults');
    expect(truncate('network-faults', 10)).toBe('network...');
    expect(truncate('network-faults', 2)).toBe('ne');
  });

  it('should format offsets in seconds', () => {
    expect(formatOffset(0)).toBe('+0.000s');
    expect(formatOffset(61_005)).toBe('+61.005s');
  });

  it('should label statuses', () => {
    expect(stripVTControlCharacters(statusBadge('failed'))).toBe('● failed');
    expect(stripVTControlCharacters(statusBadge('unavailable'))).toBe('○ unavailable');
  });

  it('should print aligned table rows', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    table([{ id: 'pod-faults', fields: 6 }, { id: 'network-faults', fields: 9 }], [
      { key: 'id', header: 'ID' },
      { key: 'fields', header: 'Fields' },
    ]);

    const lines = log.mock.calls.map((call) => stripVTControlCharacters(String(call[0])));
    expect(lines).toEqual([
      'ID              Fields',
      '──────────────────────',
      'pod-faults      6     ',
      'network-faults  9     ',
    ]);
  });

  it('should print rows as JSON in json mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setOutputFormat('json');

    table([{ id: 'pod-faults' }]);

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual([{ id: 'pod-faults' }]);
  });
});
