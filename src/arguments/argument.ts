/**
 * Argument Model
 *
 * Optionals are flags, values or lists addressed by `-s` / `--long`.
 * Required arguments are positional values or lists matched in declared
 * order. Each is a closed tagged union on `kind`; the engine switches on it
 * and the payload keeps its type parameter without a downcast.
 */

import { ValueType } from '../conversion/value-type';
import { Result, ok, err, mapErr, collect } from '../types/result';

/** Arity of a list: every token up to the next flag or the end of the window */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

export interface OptionalNames {
  /** Single character, matched as `-x` */
  readonly short?: string;
  /** Matched as `--long` */
  readonly long?: string;
  readonly description: string;
}

export interface OptionalFlag extends OptionalNames {
  readonly kind: 'flag';
  count: number;
}

export interface OptionalValue<T> extends OptionalNames {
  readonly kind: 'value';
  readonly type: ValueType<T>;
  value: T | null;
}

export interface OptionalList<T> extends OptionalNames {
  readonly kind: 'list';
  readonly type: ValueType<T>;
  values: T[] | null;
}

export interface RequiredValue<T> {
  readonly kind: 'value';
  readonly name: string;
  readonly description: string;
  readonly type: ValueType<T>;
  value: T | null;
}

export interface RequiredList<T> {
  readonly kind: 'list';
  readonly name: string;
  readonly description: string;
  readonly type: ValueType<T>;
  values: T[] | null;
}

export type OptionalSpec = OptionalFlag | OptionalValue<unknown> | OptionalList<unknown>;
export type RequiredSpec = RequiredValue<unknown> | RequiredList<unknown>;
export type ArgumentSpec = OptionalSpec | RequiredSpec;

/*
 * Handles returned at registration. They are the specs themselves, typed
 * read-only so callers can query but not write the parsed state.
 */
export type FlagHandle = Readonly<OptionalFlag>;
export type ValueHandle<T> = Readonly<OptionalValue<T>> | Readonly<RequiredValue<T>>;
export type OptionalListHandle<T> = Readonly<Omit<OptionalList<T>, 'values'>> & {
  readonly values: readonly T[] | null;
};
export type RequiredListHandle<T> = Readonly<Omit<RequiredList<T>, 'values'>> & {
  readonly values: readonly T[] | null;
};
export type ListHandle<T> = OptionalListHandle<T> | RequiredListHandle<T>;

/**
 * Why consume() refused its tokens
 */
export type ConsumeError =
  | { code: 'MISSING_VALUE' }
  | { code: 'CONVERSION_FAILURE'; token: string; reason: string };

export function createFlag(names: OptionalNames): OptionalFlag {
  return { kind: 'flag', ...names, count: 0 };
}

export function createOptionalValue<T>(names: OptionalNames, type: ValueType<T>): OptionalValue<T> {
  return { kind: 'value', ...names, type, value: null };
}

export function createOptionalList<T>(names: OptionalNames, type: ValueType<T>): OptionalList<T> {
  return { kind: 'list', ...names, type, values: null };
}

export function createRequiredValue<T>(
  name: string,
  description: string,
  type: ValueType<T>
): RequiredValue<T> {
  return { kind: 'value', name, description, type, value: null };
}

export function createRequiredList<T>(
  name: string,
  description: string,
  type: ValueType<T>
): RequiredList<T> {
  return { kind: 'list', name, description, type, values: null };
}

/**
 * Number of tokens the argument takes when matched
 */
export function arity(spec: ArgumentSpec): number {
  switch (spec.kind) {
    case 'flag':
      return 0;
    case 'value':
      return 1;
    case 'list':
      return UNBOUNDED;
  }
}

/**
 * Convert and store tokens from the front of `tokens`.
 *
 * The caller has already cut the window before the next flag-looking token,
 * so a list takes everything it is given. Returns the number consumed.
 */
export function consume(spec: ArgumentSpec, tokens: readonly string[]): Result<number, ConsumeError> {
  switch (spec.kind) {
    case 'flag':
      spec.count += 1;
      return ok(0);

    case 'value': {
      if (tokens.length === 0) {
        return err({ code: 'MISSING_VALUE' });
      }
      const token = tokens[0];
      const converted = spec.type.convert(token);
      if (!converted.ok) {
        return err({ code: 'CONVERSION_FAILURE', token, reason: converted.error });
      }
      spec.value = converted.value;
      return ok(1);
    }

    case 'list': {
      if (tokens.length === 0) {
        return err({ code: 'MISSING_VALUE' });
      }
      const type = spec.type;
      const converted = collect(tokens, (token) =>
        mapErr(type.convert(token), (reason): ConsumeError => ({
          code: 'CONVERSION_FAILURE',
          token,
          reason,
        }))
      );
      if (!converted.ok) {
        return converted;
      }
      // Repeated occurrences append
      spec.values = [...(spec.values ?? []), ...converted.value];
      return ok(tokens.length);
    }
  }
}

/**
 * Whether a required argument has received what it needs
 */
export function isSatisfied(spec: RequiredSpec): boolean {
  return spec.kind === 'value' ? spec.value !== null : spec.values !== null;
}

/**
 * Name used in messages: `--output`, `-v` when there is no long flag, `<file>`
 */
export function displayName(spec: ArgumentSpec): string {
  if ('name' in spec) {
    return `<${spec.name}>`;
  }
  if (spec.long !== undefined) {
    return `--${spec.long}`;
  }
  return `-${spec.short ?? ''}`;
}

// =============================================================================
// Retrieval
// =============================================================================

export function flagCount(handle: FlagHandle): number {
  return handle.count;
}

export function isFlagSet(handle: FlagHandle): boolean {
  return handle.count >= 1;
}

/**
 * Parsed value, or undefined when the argument never matched
 */
export function getValue<T>(handle: ValueHandle<T>): T | undefined {
  return handle.value ?? undefined;
}

/**
 * Parsed values in order; empty when the list never matched
 */
export function getValues<T>(handle: ListHandle<T>): readonly T[] {
  return handle.values ?? [];
}

/**
 * Distinguishes "never matched" from a present value or list
 */
export function isPresent(handle: FlagHandle | ValueHandle<unknown> | ListHandle<unknown>): boolean {
  switch (handle.kind) {
    case 'flag':
      return handle.count >= 1;
    case 'value':
      return handle.value !== null;
    case 'list':
      return handle.values !== null;
  }
}
