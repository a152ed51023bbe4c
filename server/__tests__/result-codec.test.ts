import { describe, it, expect } from 'vitest';
import { deserializeResult, serializeResult, toJsonRows } from '../result-codec';

describe('result-codec', () => {
  describe('toJsonRows', () => {
    it('converts driver values to their JSON equivalents', () => {
      const rows = toJsonRows([
        {
          hour: new Date('2026-02-14T08:00:00.000Z'),
          revenue: '199.99',
          total: 42n,
          ratio: Number.NaN,
          spike: Number.POSITIVE_INFINITY,
          missing: undefined,
          raw: Buffer.from('ab'),
          meta: { seenAt: new Date('2026-02-14T08:30:00.000Z'), tags: ['a', 1] },
        },
      ]);

      expect(rows).toEqual([
        {
          hour: '2026-02-14T08:00:00.000Z',
          revenue: '199.99',
          total: '42',
          ratio: null,
          spike: null,
          missing: null,
          raw: 'YWI=',
          meta: { seenAt: '2026-02-14T08:30:00.000Z', tags: ['a', 1] },
        },
      ]);
    });

    it('keeps NUMERIC strings exact', () => {
      const [row] = toJsonRows([{ amount: '12345678.90' }]);
      expect(row.amount).toBe('12345678.90');
    });
  });

  describe('deserializeResult', () => {
    it('reconstructs exactly what was served fresh', () => {
      const fresh = toJsonRows([
        { hour: new Date('2026-02-14T08:00:00.000Z'), revenue: '0.10', event_count: 3, prev: null },
      ]);

      expect(deserializeResult(serializeResult(fresh))).toEqual(fresh);
    });

    it('decodes an empty result', () => {
      expect(deserializeResult('[]')).toEqual([]);
    });

    it.each([
      ['malformed JSON', '[{"a":'],
      ['a JSON object', '{"a":1}'],
      ['an array of scalars', '[1,2,3]'],
      ['null', 'null'],
    ])('returns null for %s', (_label, payload) => {
      expect(deserializeResult(payload)).toBeNull();
    });
  });
});
