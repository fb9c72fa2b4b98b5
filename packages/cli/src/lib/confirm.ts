import type { CliIO } from './io.js';

/** Only an explicit y/Y confirms. Empty input, n and typos all cancel. */
export function isAffirmative(answer: string): boolean {
  return answer.trim().toUpperCase() === 'Y';
}

export async function confirm(io: CliIO, question: string, force = false): Promise<boolean> {
  if (force) return true;
  return isAffirmative(await io.ask(`${question} [y/N]: `));
}
