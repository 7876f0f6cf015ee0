import { describe, it, expect } from 'vitest';
import { isPermissionValue, mergePermissionValues, normalizeName } from '../../src/core/permission-value.js';

describe('PermissionValue', () => {
  describe('mergePermissionValues', () => {
    it('should return inherit for an empty list', () => {
      expect(mergePermissionValues([])).toBe('inherit');
    });

    it('should return allow when only allow and inherit are present', () => {
      expect(mergePermissionValues(['inherit', 'allow', 'inherit'])).toBe('allow');
    });

    it('should let deny dominate allow regardless of order', () => {
      expect(mergePermissionValues(['allow', 'deny'])).toBe('deny');
      expect(mergePermissionValues(['deny', 'allow'])).toBe('deny');
    });
  });

  it('should normalize names case-insensitively', () => {
    expect(normalizeName('Post-Edit')).toBe(normalizeName('POST-EDIT'));
    expect(normalizeName('Post-Edit')).toBe('post-edit');
  });

  it('should recognize only the three permission values', () => {
    expect(isPermissionValue('allow')).toBe(true);
    expect(isPermissionValue('inherit')).toBe(true);
    expect(isPermissionValue('Allow')).toBe(false);
    expect(isPermissionValue(1)).toBe(false);
  });
});
