import type { ContextTriple, PackageAxes, ResolverConfig } from '@scopepack/common';
import { displayContext } from '@scopepack/core';
import type { SessionOptions } from '@scopepack/core';
import type { OptionDef, ParsedArgs } from '../lib/command-parser.js';
import type { CliIO } from '../lib/io.js';

export interface CommandEnv {
  config: ResolverConfig;
  io: CliIO;
  /** Collaborators handed to every session the command opens. */
  session?: Omit<SessionOptions, 'mode'>;
}

export const AXIS_OPTIONS: readonly OptionDef[] = [
  { name: 'step', kind: 'value', aliases: ['s'] },
  { name: 'software', kind: 'value', aliases: ['sw'] },
];

export function axesOf(args: ParsedArgs): PackageAxes {
  return { step: args.values.get('step'), software: args.values.get('software') };
}

export function contextLine(triple: ContextTriple, axes: PackageAxes): string {
  return `Current context: ${displayContext(triple)} [step: ${axes.step ?? 'all'}] (software: ${axes.software ?? 'all'})`;
}
