import { z } from 'zod';
import { KEYPAD_DIRECTIONS, isKeypadDigit, type Direction, type KeypadDigit } from '../types/game';

/**
 * Console input validation.
 *
 * Every prompt reads one whitespace-delimited token. Parsing never throws:
 * the caller gets either the typed value or the reason the token was refused,
 * and re-prompts on the latter.
 */

export type InputErrorCode = 'NOT_A_NUMBER' | 'OUT_OF_RANGE';

export type InputResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: InputErrorCode; raw: string };

// The whole token must be an integer. This is stricter than reading a leading
// integer prefix: "3abc" and "8.5" are refused instead of read as 3 and 8.
export const IntegerTokenSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform((value) => Number.parseInt(value, 10));

export const KeypadDigitSchema = z
  .number()
  .int()
  .refine((value): value is KeypadDigit => isKeypadDigit(value), {
    message: 'Expected a keypad direction 1-9 other than 5',
  });

export function coordinateSchema(size: number) {
  return z.number().int().min(1).max(size);
}

function parseWith<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, number>): InputResult<T> {
  const integer = IntegerTokenSchema.safeParse(raw);
  if (!integer.success) {
    return { ok: false, error: 'NOT_A_NUMBER', raw };
  }

  const ranged = schema.safeParse(integer.data);
  if (!ranged.success) {
    return { ok: false, error: 'OUT_OF_RANGE', raw };
  }

  return { ok: true, value: ranged.data };
}

/**
 * Numeric-keypad direction: 7 8 9 / 4 _ 6 / 1 2 3.
 */
export function parseDirectionInput(raw: string): InputResult<Direction> {
  const digit = parseWith(raw, KeypadDigitSchema);
  if (!digit.ok) {
    return digit;
  }
  return { ok: true, value: KEYPAD_DIRECTIONS[digit.value] };
}

/**
 * 1-based row or column in [1, size], returned 0-based.
 */
export function parseCoordinateInput(raw: string, size: number): InputResult<number> {
  const coordinate = parseWith(raw, coordinateSchema(size));
  if (!coordinate.ok) {
    return coordinate;
  }
  return { ok: true, value: coordinate.value - 1 };
}
