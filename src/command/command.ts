/**
 * Command Tree
 *
 * A command owns its optional arguments, its positional arguments (in
 * declared order) and its subcommands. All registration happens before
 * parsing and fails fast on collisions.
 */

import {
  OptionalNames,
  OptionalSpec,
  RequiredSpec,
  FlagHandle,
  OptionalValue,
  OptionalListHandle,
  RequiredValue,
  RequiredListHandle,
  createFlag,
  createOptionalValue,
  createOptionalList,
  createRequiredValue,
  createRequiredList,
  isSatisfied,
} from '../arguments/argument';
import { ValueType } from '../conversion/value-type';
import { RegistrationError } from '../types/parse-error';
import { validateOptionalNames, validateWordName } from '../schemas/validators';

export interface CommandSettings {
  /** Register `-h/--help` on this command and every subcommand */
  addHelp: boolean;
}

const DEFAULT_SETTINGS: CommandSettings = { addHelp: true };

function describeNames(names: OptionalNames): string {
  const parts: string[] = [];
  if (names.short !== undefined) parts.push(`-${names.short}`);
  if (names.long !== undefined) parts.push(`--${names.long}`);
  return parts.join('/');
}

export class Command {
  readonly name: string;
  readonly description: string;
  /** The automatic `-h/--help` flag, when enabled */
  readonly helpFlag: FlagHandle | null;

  private readonly optionals: OptionalSpec[] = [];
  private readonly requireds: RequiredSpec[] = [];
  private readonly commands = new Map<string, Command>();
  private readonly settings: CommandSettings;

  constructor(name: string, description = '', settings: CommandSettings = DEFAULT_SETTINGS) {
    const validation = validateWordName(name);
    if (!validation.success) {
      throw new RegistrationError(
        'INVALID_NAME',
        `Invalid command name "${name}": ${validation.errors.join(', ')}`
      );
    }
    this.name = name;
    this.description = description;
    this.settings = settings;
    this.helpFlag = settings.addHelp
      ? this.addOptFlag({ short: 'h', long: 'help', description: 'Show this help message' })
      : null;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  addOptFlag(names: OptionalNames): FlagHandle {
    return this.registerOptional(createFlag(names));
  }

  addOptValue<T>(type: ValueType<T>, names: OptionalNames): Readonly<OptionalValue<T>> {
    return this.registerOptional(createOptionalValue(names, type));
  }

  addOptList<T>(type: ValueType<T>, names: OptionalNames): OptionalListHandle<T> {
    return this.registerOptional(createOptionalList(names, type));
  }

  addReqValue<T>(type: ValueType<T>, name: string, description = ''): Readonly<RequiredValue<T>> {
    return this.registerRequired(createRequiredValue(name, description, type));
  }

  addReqList<T>(type: ValueType<T>, name: string, description = ''): RequiredListHandle<T> {
    return this.registerRequired(createRequiredList(name, description, type));
  }

  /**
   * Add a subcommand. It inherits this command's settings.
   */
  addCommand(name: string, description = ''): Command {
    this.assertWordName(name, 'command');
    if (this.commands.has(name) || this.requireds.some((r) => r.name === name)) {
      throw new RegistrationError('DUPLICATE_ARGUMENT', `Duplicated command name ${name}`);
    }
    const child = new Command(name, description, this.settings);
    this.commands.set(name, child);
    return child;
  }

  private registerOptional<S extends OptionalSpec>(spec: S): S {
    const validation = validateOptionalNames({
      short: spec.short,
      long: spec.long,
      description: spec.description,
    });
    if (!validation.success) {
      throw new RegistrationError(
        'INVALID_NAME',
        `Invalid optional argument ${describeNames(spec) || '(unnamed)'}: ${validation.errors.join(', ')}`
      );
    }

    const clash = this.optionals.find(
      (existing) =>
        (spec.short !== undefined && existing.short === spec.short) ||
        (spec.long !== undefined && existing.long === spec.long)
    );
    if (clash) {
      throw new RegistrationError(
        'DUPLICATE_ARGUMENT',
        `Duplicated optional argument for ${describeNames(spec)}`
      );
    }

    this.optionals.push(spec);
    return spec;
  }

  private registerRequired<S extends RequiredSpec>(spec: S): S {
    this.assertWordName(spec.name, 'required argument');
    if (this.requireds.some((r) => r.name === spec.name) || this.commands.has(spec.name)) {
      throw new RegistrationError(
        'DUPLICATE_ARGUMENT',
        `Duplicated required argument for ${spec.name}`
      );
    }
    // A list takes every positional token up to the next flag, so a second
    // list in the same command could never receive anything.
    const list = this.requireds.find((r) => r.kind === 'list');
    if (spec.kind === 'list' && list) {
      throw new RegistrationError(
        'UNREACHABLE_ARGUMENT',
        `Required list ${spec.name} can never be reached after required list ${list.name}`
      );
    }

    this.requireds.push(spec);
    return spec;
  }

  private assertWordName(name: string, what: string): void {
    const validation = validateWordName(name);
    if (!validation.success) {
      throw new RegistrationError(
        'INVALID_NAME',
        `Invalid ${what} name "${name}": ${validation.errors.join(', ')}`
      );
    }
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  get optionalSpecs(): readonly OptionalSpec[] {
    return this.optionals;
  }

  get requiredSpecs(): readonly RequiredSpec[] {
    return this.requireds;
  }

  get subcommands(): readonly Command[] {
    return [...this.commands.values()];
  }

  findShort(short: string): OptionalSpec | undefined {
    return this.optionals.find((o) => o.short === short);
  }

  findLong(long: string): OptionalSpec | undefined {
    return this.optionals.find((o) => o.long === long);
  }

  findRequired(name: string): RequiredSpec | undefined {
    return this.requireds.find((r) => r.name === name);
  }

  requiredAt(index: number): RequiredSpec | undefined {
    return this.requireds[index];
  }

  findCommand(name: string): Command | undefined {
    return this.commands.get(name);
  }

  /**
   * First positional slot, in declared order, that has not been filled
   */
  nextUnsatisfied(): RequiredSpec | undefined {
    return this.requireds.find((r) => !isSatisfied(r));
  }

  /**
   * With a digit short flag registered, `-5` is a flag rather than a number
   */
  hasDigitShortFlag(): boolean {
    return this.optionals.some((o) => o.short !== undefined && /^\d$/.test(o.short));
  }
}
