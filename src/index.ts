/**
 * argtree - typed command-line parsing over a tree of commands
 */

export * from './core';

export { Command } from './command/command';
export type { CommandSettings } from './command/command';

export {
  UNBOUNDED,
  arity,
  consume,
  isSatisfied,
  displayName,
  flagCount,
  isFlagSet,
  getValue,
  getValues,
  isPresent,
} from './arguments/argument';
export type {
  OptionalNames,
  OptionalFlag,
  OptionalValue,
  OptionalList,
  RequiredValue,
  RequiredList,
  OptionalSpec,
  RequiredSpec,
  ArgumentSpec,
  FlagHandle,
  ValueHandle,
  ListHandle,
  OptionalListHandle,
  RequiredListHandle,
  ConsumeError,
} from './arguments/argument';

export { valueTypes, defineValueType, fromSchema } from './conversion/value-type';
export type { ValueType } from './conversion/value-type';

export * from './schemas';
export * from './types';
export * from './logging';
export * from './cli';
