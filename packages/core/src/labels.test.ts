import { describe, it, expect } from 'vitest';
import { labelKey, normalizeLabels } from './labels';

describe('labels', () => {
  describe('normalizeLabels', () => {
    it('should treat absent or malformed labels as empty', () => {
      expect(normalizeLabels(undefined)).toEqual({});
      expect(normalizeLabels(null)).toEqual({});
      expect(normalizeLabels('type=dish')).toEqual({});
      expect(normalizeLabels(['dish'])).toEqual({});
      expect(normalizeLabels(42)).toEqual({});
    });

    it('should stringify scalars and drop other values', () => {
      expect(
        normalizeLabels({ type: 'dish', page: 2, cached: false, nested: { a: 1 }, missing: undefined })
      ).toEqual({ type: 'dish', page: '2', cached: 'false' });
    });
  });

  describe('labelKey', () => {
    it('should not depend on insertion order', () => {
      expect(labelKey({ b: '2', a: '1' })).toBe(labelKey({ a: '1', b: '2' }));
      expect(labelKey({ b: '2', a: '1' })).toBe('[["a","1"],["b","2"]]');
    });

    it('should map the empty set to an empty array', () => {
      expect(labelKey({})).toBe('[]');
    });

    it('should keep label sets apart when values contain delimiters', () => {
      const first = labelKey({ a: '1,b=2' });
      const second = labelKey({ a: '1', b: '2' });
      expect(first).not.toBe(second);
    });
  });
});
