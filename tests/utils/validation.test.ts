/**
 * Validation utilities tests
 */

import { ValidationUtils } from '../../src/utils/validation';

const NOW = new Date('2026-02-15T12:00:00.000Z');
const OFFSET = -180;

describe('ValidationUtils', () => {
  describe('parseDateToken', () => {
    it('should resolve today and yesterday tokens', () => {
      expect(ValidationUtils.parseDateToken('hoje', NOW, OFFSET)).toEqual({
        ok: true,
        day: { year: 2026, month: 2, day: 15 },
      });
      expect(ValidationUtils.parseDateToken('today', NOW, OFFSET)).toEqual({
        ok: true,
        day: { year: 2026, month: 2, day: 15 },
      });
      expect(ValidationUtils.parseDateToken(' Ontem ', NOW, OFFSET)).toEqual({
        ok: true,
        day: { year: 2026, month: 2, day: 14 },
      });
      expect(ValidationUtils.parseDateToken('yesterday', NOW, OFFSET)).toEqual({
        ok: true,
        day: { year: 2026, month: 2, day: 14 },
      });
    });

    it('should resolve today in the fixed offset, not in UTC', () => {
      const lateEvening = new Date('2026-02-16T02:30:00.000Z');

      expect(ValidationUtils.parseDateToken('hoje', lateEvening, OFFSET)).toEqual({
        ok: true,
        day: { year: 2026, month: 2, day: 15 },
      });
    });

    it('should parse explicit DD/MM/YYYY dates', () => {
      expect(ValidationUtils.parseDateToken('05/03/2026', NOW, OFFSET)).toEqual({
        ok: true,
        day: { year: 2026, month: 3, day: 5 },
      });
    });

    it('should reject dates that do not exist', () => {
      expect(ValidationUtils.parseDateToken('31/13/2026', NOW, OFFSET)).toEqual({
        ok: false,
        error: 'Date does not exist',
      });
      expect(ValidationUtils.parseDateToken('30/02/2026', NOW, OFFSET).ok).toBe(false);
    });

    it('should reject malformed input', () => {
      expect(ValidationUtils.parseDateToken('abc', NOW, OFFSET)).toEqual({
        ok: false,
        error: 'Date must be in DD/MM/YYYY format',
      });
      expect(ValidationUtils.parseDateToken('5/3/2026', NOW, OFFSET).ok).toBe(false);
      expect(ValidationUtils.parseDateToken('', NOW, OFFSET)).toEqual({
        ok: false,
        error: 'Date is required',
      });
    });
  });

  describe('sanitizeString', () => {
    it('should trim strings and drop blank ones', () => {
      expect(ValidationUtils.sanitizeString('  Grupo  ')).toBe('Grupo');
      expect(ValidationUtils.sanitizeString('   ')).toBeUndefined();
      expect(ValidationUtils.sanitizeString(42)).toBeUndefined();
    });
  });
});
