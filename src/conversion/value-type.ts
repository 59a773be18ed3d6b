/**
 * Value Conversion
 *
 * A ValueType turns one argv token into a typed value. The engine only ever
 * calls `convert`, so new types plug in without touching it.
 */

import { z } from 'zod';
import { Result, ok, err } from '../types/result';

export interface ValueType<T> {
  /** Shown in help output, e.g. `--count <int>` */
  readonly name: string;
  convert(text: string): Result<T, string>;
}

/**
 * Define a value type from a plain conversion function
 */
export function defineValueType<T>(
  name: string,
  convert: (text: string) => Result<T, string>
): ValueType<T> {
  return { name, convert };
}

/**
 * Define a value type from a zod schema whose input is the raw token
 */
export function fromSchema<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, string>
): ValueType<T> {
  return defineValueType(name, (text) => {
    const result = schema.safeParse(text);
    if (result.success) {
      return ok(result.data);
    }
    return err(result.error.issues.map((issue) => issue.message).join('; '));
  });
}

const intSchema = z.string().transform((text, ctx) => {
  if (!/^[+-]?\d+$/.test(text)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a base-10 integer' });
    return z.NEVER;
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'integer out of range' });
    return z.NEVER;
  }
  // "-0" is zero
  return value === 0 ? 0 : value;
});

const numberSchema = z.string().transform((text, ctx) => {
  const value = Number(text);
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(text) || !Number.isFinite(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a finite number' });
    return z.NEVER;
  }
  return value;
});

/**
 * Built-in value types
 */
export const valueTypes = {
  int: fromSchema('int', intSchema),
  number: fromSchema('number', numberSchema),
  string: defineValueType('string', (text) => ok(text)),
} as const;
