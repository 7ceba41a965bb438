/**
 * Validation schemas and utilities for operator input
 */

import { z } from 'zod';
import { addDays, calendarDayOf, CalendarDay, isValidCalendarDay } from './time';

const TODAY_TOKENS = ['hoje', 'today'];
const YESTERDAY_TOKENS = ['ontem', 'yesterday'];

// Explicit date (DD/MM/YYYY), strictly two-digit day and month
export const explicitDateSchema = z
  .string()
  .trim()
  .regex(/^(\d{2})\/(\d{2})\/(\d{4})$/, {
    message: 'Date must be in DD/MM/YYYY format',
  })
  .transform((value): CalendarDay => {
    const [day, month, year] = value.split('/').map((part) => parseInt(part, 10));
    return { year, month, day };
  })
  .refine(isValidCalendarDay, { message: 'Date does not exist' });

export type DateTokenResult =
  | { ok: true; day: CalendarDay }
  | { ok: false; error: string };

export class ValidationUtils {
  /**
   * Resolves `hoje`/`today`, `ontem`/`yesterday` or an explicit DD/MM/YYYY date
   * against the current day in the fixed offset
   */
  static parseDateToken(
    input: string,
    now: Date,
    offsetMinutes: number,
  ): DateTokenResult {
    const token = input.trim().toLowerCase();
    if (token.length === 0) {
      return { ok: false, error: 'Date is required' };
    }

    const today = calendarDayOf(now, offsetMinutes);
    if (TODAY_TOKENS.includes(token)) {
      return { ok: true, day: today };
    }
    if (YESTERDAY_TOKENS.includes(token)) {
      return { ok: true, day: addDays(today, -1) };
    }

    const result = explicitDateSchema.safeParse(token);
    if (!result.success) {
      return {
        ok: false,
        error: result.error.errors[0]?.message || 'Invalid date',
      };
    }
    return { ok: true, day: result.data };
  }

  /**
   * Sanitizes string input by trimming whitespace
   */
  static sanitizeString(input: unknown): string | undefined {
    if (typeof input !== 'string') {
      return undefined;
    }
    const trimmed = input.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
}
