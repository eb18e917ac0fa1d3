/**
 * Minimal `--name=value` argument helpers for the scripts.
 */

export function getFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/**
 * @throws Error when the value is present but not a non-negative integer
 */
export function getIntFlag(args: string[], name: string): number | undefined {
  const value = getFlag(args, name);
  if (value === undefined) return undefined;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Arguments that are not flags.
 */
export function getPositionals(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('--'));
}
