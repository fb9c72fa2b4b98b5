import { ScopepackError } from '@scopepack/common';

export type OptionKind = 'flag' | 'value' | 'list';

export interface OptionDef {
  name: string;
  kind: OptionKind;
  aliases?: readonly string[];
}

export interface ParsedArgs {
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
  lists: Map<string, string[]>;
}

export class UsageError extends ScopepackError {
  constructor(message: string) {
    super(message, 'USAGE', true);
    this.name = 'UsageError';
  }
}

function isOptionToken(token: string): boolean {
  return token.length > 1 && token.startsWith('-');
}

function indexOptions(defs: readonly OptionDef[]): Map<string, OptionDef> {
  const byToken = new Map<string, OptionDef>();
  for (const def of defs) {
    byToken.set(`--${def.name}`, def);
    for (const alias of def.aliases ?? []) {
      byToken.set(`-${alias}`, def);
    }
  }
  return byToken;
}

/**
 * Parse command arguments against a fixed option table.
 * Format: "ctx1 ctx2 --flag -s value -i pkg1 pkg2"
 * A list option consumes every following token up to the next option.
 *
 * @example
 * parseArgs(['show', '-i', 'maya', 'nuke'], MANAGE_OPTIONS)
 * // positionals: ['show'], lists: { install: ['maya', 'nuke'] }
 */
export function parseArgs(argv: readonly string[], defs: readonly OptionDef[]): ParsedArgs {
  const byToken = indexOptions(defs);
  const parsed: ParsedArgs = {
    positionals: [],
    flags: new Set(),
    values: new Map(),
    lists: new Map(),
  };

  let i = 0;
  while (i < argv.length) {
    const token = argv[i] ?? '';
    i += 1;

    if (!isOptionToken(token)) {
      parsed.positionals.push(token);
      continue;
    }

    const def = byToken.get(token);
    if (!def) {
      throw new UsageError(`Unknown option: ${token}`);
    }

    switch (def.kind) {
      case 'flag':
        parsed.flags.add(def.name);
        break;
      case 'value': {
        const value = argv[i];
        if (value === undefined || isOptionToken(value)) {
          throw new UsageError(`Option ${token} expects a value`);
        }
        parsed.values.set(def.name, value);
        i += 1;
        break;
      }
      case 'list': {
        const items = parsed.lists.get(def.name) ?? [];
        while (i < argv.length) {
          const next = argv[i] ?? '';
          if (isOptionToken(next)) break;
          items.push(next);
          i += 1;
        }
        if (items.length === 0) {
          throw new UsageError(`Option ${token} expects at least one value`);
        }
        parsed.lists.set(def.name, items);
        break;
      }
    }
  }

  return parsed;
}

export function parsePositiveInt(raw: string, option: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`Option --${option} expects a positive integer, got '${raw}'`);
  }
  return value;
}
