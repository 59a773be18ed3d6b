/**
 * Tests for the Parsing Engine
 */

import { describe, it, expect } from 'vitest';
import { parseCommand, classifyToken, createEngineContext } from './engine';
import { Command } from '../command/command';
import { valueTypes } from '../conversion/value-type';
import { flagCount, isFlagSet, getValue, getValues, isPresent } from '../arguments/argument';
import { ParseError } from '../types/parse-error';
import { Result } from '../types/result';

function command(name = 'root'): Command {
  return new Command(name, '', { addHelp: false });
}

function run(root: Command, tokens: string[]): Result<number, ParseError> {
  return parseCommand(root, tokens, createEngineContext(root));
}

function errorOf(result: Result<number, ParseError>): ParseError {
  if (result.ok) {
    throw new Error(`expected a parse error, consumed ${result.value}`);
  }
  return result.error;
}

describe('classifyToken', () => {
  const root = command();

  it('should classify flags and positionals', () => {
    expect(classifyToken('--verbose', root, false)).toBe('long');
    expect(classifyToken('-v', root, false)).toBe('short');
    expect(classifyToken('-vvv', root, false)).toBe('short');
    expect(classifyToken('file.txt', root, false)).toBe('positional');
  });

  it('should treat a lone dash as positional', () => {
    expect(classifyToken('-', root, false)).toBe('positional');
  });

  it('should recognise the end-of-options marker', () => {
    expect(classifyToken('--', root, false)).toBe('end-of-options');
  });

  it('should treat everything as positional after the marker', () => {
    expect(classifyToken('--verbose', root, true)).toBe('positional');
    expect(classifyToken('--', root, true)).toBe('positional');
  });

  it('should treat negative numbers as positional', () => {
    expect(classifyToken('-5', root, false)).toBe('positional');
    expect(classifyToken('-2.5', root, false)).toBe('positional');
  });

  it('should treat negative numbers as flags when a digit flag exists', () => {
    const withDigit = command();
    withDigit.addOptFlag({ short: '5', description: '' });
    expect(classifyToken('-5', withDigit, false)).toBe('short');
  });
});

describe('parseCommand', () => {
  describe('flags', () => {
    it('should count repeated flags', () => {
      const root = command();
      const verbose = root.addOptFlag({ short: 'v', long: 'verbose', description: '' });
      expect(run(root, ['-v', '-v', '-v'])).toEqual({ ok: true, value: 3 });
      expect(flagCount(verbose)).toBe(3);
      expect(isFlagSet(verbose)).toBe(true);
    });

    it('should expand grouped short flags', () => {
      const root = command();
      const verbose = root.addOptFlag({ short: 'v', long: 'verbose', description: '' });
      expect(run(root, ['-vvv'])).toEqual({ ok: true, value: 1 });
      expect(flagCount(verbose)).toBe(3);
      expect(isFlagSet(verbose)).toBe(true);
    });

    it('should expand mixed flag groups', () => {
      const root = command();
      const all = root.addOptFlag({ short: 'a', long: 'all', description: '' });
      const long = root.addOptFlag({ short: 'l', description: '' });
      expect(run(root, ['-la', '--all']).ok).toBe(true);
      expect(flagCount(all)).toBe(2);
      expect(flagCount(long)).toBe(1);
    });

    it('should fail on an unknown long flag', () => {
      const root = command();
      const error = errorOf(run(root, ['--nope']));
      expect(error.code).toBe('UNKNOWN_OPTION');
      expect(error.token).toBe('--nope');
      expect(error.message).toBe('Unknown option: --nope');
    });

    it('should fail on an unknown character in a group without counting the others', () => {
      const root = command();
      const verbose = root.addOptFlag({ short: 'v', description: '' });
      const error = errorOf(run(root, ['-vx']));
      expect(error.code).toBe('UNKNOWN_OPTION');
      expect(error.message).toBe('Unknown option: -x (in -vx)');
      expect(flagCount(verbose)).toBe(0);
    });

    it('should reject a value-taking option inside a group', () => {
      const root = command();
      root.addOptFlag({ short: 'v', description: '' });
      root.addOptValue(valueTypes.string, { short: 'o', long: 'output', description: '' });
      const error = errorOf(run(root, ['-vo', 'out.txt']));
      expect(error.code).toBe('AMBIGUOUS_SHORT_GROUP');
      expect(error.argument).toBe('--output');
      expect(error.message).toBe('--output takes a value and cannot be grouped in -vo');
    });

    it('should reject an inline value for a flag', () => {
      const root = command();
      root.addOptFlag({ long: 'force', description: '' });
      const error = errorOf(run(root, ['--force=yes']));
      expect(error.code).toBe('UNEXPECTED_VALUE');
      expect(error.message).toBe('--force does not take a value');
    });
  });

  describe('optional values', () => {
    it('should take the next token for a long value', () => {
      const root = command();
      const name = root.addOptValue(valueTypes.string, { long: 'name', description: '' });
      expect(run(root, ['--name', 'alice'])).toEqual({ ok: true, value: 2 });
      expect(getValue(name)).toBe('alice');
    });

    it('should take the next token for a short value', () => {
      const root = command();
      const count = root.addOptValue(valueTypes.int, { short: 'n', description: '' });
      expect(run(root, ['-n', '5']).ok).toBe(true);
      expect(getValue(count)).toBe(5);
    });

    it('should accept an inline long value', () => {
      const root = command();
      const name = root.addOptValue(valueTypes.string, { long: 'name', description: '' });
      expect(run(root, ['--name=alice'])).toEqual({ ok: true, value: 1 });
      expect(getValue(name)).toBe('alice');
    });

    it('should fail with MISSING_VALUE at the end of input', () => {
      const root = command();
      const name = root.addOptValue(valueTypes.string, { long: 'name', description: '' });
      const error = errorOf(run(root, ['--name']));
      expect(error.code).toBe('MISSING_VALUE');
      expect(error.token).toBe('--name');
      expect(error.message).toBe('--name requires a value');
      expect(isPresent(name)).toBe(false);
    });

    it('should fail with MISSING_VALUE when a flag follows', () => {
      const root = command();
      root.addOptValue(valueTypes.string, { long: 'name', description: '' });
      root.addOptFlag({ short: 'v', description: '' });
      expect(errorOf(run(root, ['--name', '-v'])).code).toBe('MISSING_VALUE');
    });

    it('should fail with MISSING_VALUE for an empty inline value', () => {
      const root = command();
      root.addOptValue(valueTypes.string, { long: 'name', description: '' });
      expect(errorOf(run(root, ['--name='])).code).toBe('MISSING_VALUE');
    });

    it('should accept a negative number as a value', () => {
      const root = command();
      const offset = root.addOptValue(valueTypes.int, { long: 'offset', description: '' });
      expect(run(root, ['--offset', '-3']).ok).toBe(true);
      expect(getValue(offset)).toBe(-3);
    });

    it('should report conversion failures with the token and reason', () => {
      const root = command();
      root.addOptValue(valueTypes.int, { short: 'n', long: 'count', description: '' });
      const error = errorOf(run(root, ['--count', 'many']));
      expect(error).toEqual({
        code: 'CONVERSION_FAILURE',
        message: 'Invalid value "many" for --count: expected a base-10 integer',
        commandPath: ['root'],
        token: 'many',
        argument: '--count',
        reason: 'expected a base-10 integer',
      });
    });
  });

  describe('optional lists', () => {
    it('should consume until the next flag', () => {
      const root = command();
      const include = root.addOptList(valueTypes.string, { short: 'I', long: 'include', description: '' });
      const verbose = root.addOptFlag({ short: 'v', description: '' });
      expect(run(root, ['-I', 'a', 'b', '-v'])).toEqual({ ok: true, value: 4 });
      expect(getValues(include)).toEqual(['a', 'b']);
      expect(flagCount(verbose)).toBe(1);
    });

    it('should append over repeated occurrences', () => {
      const root = command();
      const include = root.addOptList(valueTypes.int, { long: 'id', description: '' });
      expect(run(root, ['--id', '1', '2', '--id=3']).ok).toBe(true);
      expect(getValues(include)).toEqual([1, 2, 3]);
    });

    it('should swallow tokens a positional would otherwise take', () => {
      const root = command();
      const tags = root.addOptList(valueTypes.string, { long: 'tag', description: '' });
      root.addReqValue(valueTypes.string, 'target');
      const error = errorOf(run(root, ['--tag', 'x', 'build']));
      expect(getValues(tags)).toEqual(['x', 'build']);
      expect(error.code).toBe('UNSATISFIED_REQUIRED');
    });
  });

  describe('required positionals', () => {
    it('should convert a required integer', () => {
      const root = command();
      const count = root.addReqValue(valueTypes.int, 'count');
      expect(run(root, ['42'])).toEqual({ ok: true, value: 1 });
      expect(getValue(count)).toBe(42);
    });

    it('should fail with CONVERSION_FAILURE on text', () => {
      const root = command();
      root.addReqValue(valueTypes.int, 'count');
      const error = errorOf(run(root, ['abc']));
      expect(error.code).toBe('CONVERSION_FAILURE');
      expect(error.argument).toBe('<count>');
    });

    it('should fail with UNSATISFIED_REQUIRED on empty input', () => {
      const root = command();
      root.addReqValue(valueTypes.int, 'count');
      const error = errorOf(run(root, []));
      expect(error).toEqual({
        code: 'UNSATISFIED_REQUIRED',
        message: 'Missing required argument <count> for root',
        commandPath: ['root'],
        argument: '<count>',
      });
    });

    it('should fill slots in declared order around flags', () => {
      const root = command();
      const source = root.addReqValue(valueTypes.string, 'source');
      const dest = root.addReqValue(valueTypes.string, 'dest');
      const force = root.addOptFlag({ short: 'f', description: '' });
      expect(run(root, ['a.txt', '-f', 'b.txt']).ok).toBe(true);
      expect(getValue(source)).toBe('a.txt');
      expect(getValue(dest)).toBe('b.txt');
      expect(isFlagSet(force)).toBe(true);
    });

    it('should stop a required list before a flag', () => {
      const root = command();
      const items = root.addReqList(valueTypes.string, 'items');
      const flag = root.addOptFlag({ long: 'flag', description: '' });
      expect(run(root, ['a', 'b', '--flag'])).toEqual({ ok: true, value: 3 });
      expect(getValues(items)).toEqual(['a', 'b']);
      expect(isFlagSet(flag)).toBe(true);
    });

    it('should fill a value declared after a list once a flag interrupts it', () => {
      const root = command();
      const sources = root.addReqList(valueTypes.string, 'sources');
      const dest = root.addReqValue(valueTypes.string, 'dest');
      root.addOptFlag({ short: 'r', description: '' });
      expect(run(root, ['a', 'b', '-r', 'out']).ok).toBe(true);
      expect(getValues(sources)).toEqual(['a', 'b']);
      expect(getValue(dest)).toBe('out');
    });

    it('should fail with UNEXPECTED_TOKEN when every slot is filled', () => {
      const root = command();
      root.addReqValue(valueTypes.string, 'only');
      const error = errorOf(run(root, ['one', 'two']));
      expect(error.code).toBe('UNEXPECTED_TOKEN');
      expect(error.token).toBe('two');
      expect(error.message).toBe('Unexpected argument: two');
    });

    it('should take flag-looking tokens after the end-of-options marker', () => {
      const root = command();
      const files = root.addReqList(valueTypes.string, 'files');
      root.addOptFlag({ short: 'v', description: '' });
      expect(run(root, ['--', '-v', '--weird'])).toEqual({ ok: true, value: 3 });
      expect(getValues(files)).toEqual(['-v', '--weird']);
    });

    it('should accept a lone dash as a value', () => {
      const root = command();
      const input = root.addReqValue(valueTypes.string, 'input');
      expect(run(root, ['-']).ok).toBe(true);
      expect(getValue(input)).toBe('-');
    });
  });

  describe('subcommands', () => {
    function tree() {
      const root = command();
      const verbose = root.addOptFlag({ short: 'v', description: '' });
      const child = root.addCommand('child');
      const x = child.addReqValue(valueTypes.int, 'x');
      return { root, verbose, child, x };
    }

    it('should descend into a matching subcommand', () => {
      const { root, x } = tree();
      const context = createEngineContext(root);
      expect(parseCommand(root, ['child', '7'], context)).toEqual({ ok: true, value: 2 });
      expect(getValue(x)).toBe(7);
      expect(context.path).toEqual(['root', 'child']);
    });

    it('should fail with UNEXPECTED_TOKEN for an unknown subcommand', () => {
      const { root } = tree();
      const error = errorOf(run(root, ['unknown', '7']));
      expect(error.code).toBe('UNEXPECTED_TOKEN');
      expect(error.token).toBe('unknown');
      expect(error.commandPath).toEqual(['root']);
    });

    it('should scope UNSATISFIED_REQUIRED to the subcommand', () => {
      const { root } = tree();
      const error = errorOf(run(root, ['child']));
      expect(error.code).toBe('UNSATISFIED_REQUIRED');
      expect(error.commandPath).toEqual(['root', 'child']);
      expect(error.message).toBe('Missing required argument <x> for root child');
    });

    it('should give the subcommand every remaining token', () => {
      const { root, verbose } = tree();
      const error = errorOf(run(root, ['child', '7', '-v']));
      expect(error.code).toBe('UNKNOWN_OPTION');
      expect(error.commandPath).toEqual(['root', 'child']);
      expect(flagCount(verbose)).toBe(0);
    });

    it('should consume parent flags given before the subcommand', () => {
      const { root, verbose, x } = tree();
      expect(run(root, ['-v', 'child', '7'])).toEqual({ ok: true, value: 3 });
      expect(flagCount(verbose)).toBe(1);
      expect(getValue(x)).toBe(7);
    });

    it('should fill positionals before matching subcommand names', () => {
      const root = command();
      const target = root.addReqValue(valueTypes.string, 'target');
      const run1 = root.addCommand('run');
      const args = run1.addReqList(valueTypes.string, 'args');
      expect(run(root, ['run', 'run', 'x']).ok).toBe(true);
      expect(getValue(target)).toBe('run');
      expect(getValues(args)).toEqual(['x']);
    });

    it('should succeed without a subcommand when none is given', () => {
      const { root, child } = tree();
      const context = createEngineContext(root);
      expect(parseCommand(root, ['-v'], context).ok).toBe(true);
      expect(context.trail).toEqual([root]);
      expect(child.nextUnsatisfied()).toBeDefined();
    });

    it('should carry the end-of-options marker into subcommands', () => {
      const root = command();
      const exec = root.addCommand('exec');
      const argv = exec.addReqList(valueTypes.string, 'argv');
      exec.addOptFlag({ short: 'l', description: '' });
      expect(run(root, ['--', 'exec', '-l']).ok).toBe(true);
      expect(getValues(argv)).toEqual(['-l']);
    });
  });
});
