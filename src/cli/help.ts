/**
 * CLI Help Text
 *
 * Renders usage and help for one command of a tree. Reads the tree only.
 */

import { Command } from '../command/command';
import { OptionalSpec, RequiredSpec } from '../arguments/argument';

interface HelpRow {
  left: string;
  description: string;
}

function optionLeft(spec: OptionalSpec): string {
  let left: string;
  if (spec.short !== undefined && spec.long !== undefined) {
    left = `-${spec.short}, --${spec.long}`;
  } else if (spec.short !== undefined) {
    left = `-${spec.short}`;
  } else {
    // Keep long flags aligned with the ones that have a short form
    left = `    --${spec.long ?? ''}`;
  }

  switch (spec.kind) {
    case 'flag':
      return left;
    case 'value':
      return `${left} <${spec.type.name}>`;
    case 'list':
      return `${left} <${spec.type.name}...>`;
  }
}

function requiredLeft(spec: RequiredSpec): string {
  return spec.kind === 'list' ? `<${spec.name}...>` : `<${spec.name}>`;
}

/**
 * One-line usage, e.g. `Usage: git remote add [options] <name> <url>`
 */
export function getUsageLine(command: Command, path: readonly string[]): string {
  const parts = ['Usage:', ...path];
  if (command.optionalSpecs.length > 0) {
    parts.push('[options]');
  }
  for (const spec of command.requiredSpecs) {
    parts.push(requiredLeft(spec));
  }
  if (command.subcommands.length > 0) {
    parts.push('[command]');
  }
  return parts.join(' ');
}

/**
 * Full help for a command: usage, description, then the Arguments,
 * Options and Commands sections that have entries.
 */
export function getHelpText(command: Command, path: readonly string[] = [command.name]): string {
  const sections: Array<[string, HelpRow[]]> = [
    [
      'Arguments',
      command.requiredSpecs.map((spec) => ({ left: requiredLeft(spec), description: spec.description })),
    ],
    [
      'Options',
      command.optionalSpecs.map((spec) => ({ left: optionLeft(spec), description: spec.description })),
    ],
    [
      'Commands',
      command.subcommands.map((child) => ({ left: child.name, description: child.description })),
    ],
  ];

  const width = Math.max(0, ...sections.flatMap(([, rows]) => rows.map((row) => row.left.length)));

  const lines = [getUsageLine(command, path)];
  if (command.description) {
    lines.push('', command.description);
  }
  for (const [title, rows] of sections) {
    if (rows.length === 0) {
      continue;
    }
    lines.push('', `${title}:`);
    for (const row of rows) {
      lines.push(`  ${row.left.padEnd(width)}  ${row.description}`.trimEnd());
    }
  }
  return lines.join('\n');
}
