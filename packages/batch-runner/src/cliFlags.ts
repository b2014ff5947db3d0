/* --------------------- CLI helpers --------------------- */

/** Value after `--name`, or `def` when the flag is absent or has no value. */
export function getFlag(args: string[], name: string): string | undefined;
export function getFlag(args: string[], name: string, def: string): string;
export function getFlag(args: string[], name: string, def?: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  if (i < 0) return def;
  const v = args[i + 1];
  return v === undefined || v.startsWith('--') ? def : v;
}

export function getBool(args: string[], name: string, def = false) {
  return args.includes(`--${name}`) ? true : def;
}

export function getNumber(args: string[], name: string, def: number): number {
  const raw = getFlag(args, name);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`--${name} expects a number, got "${raw}"`);
  return n;
}

/** Comma list of numbers, e.g. `--sizes 4,6,8`. */
export function getNumberList(args: string[], name: string, def: number[]): number[] {
  const raw = getFlag(args, name);
  if (raw === undefined) return def;
  return raw.split(',').map(s => {
    const n = Number(s.trim());
    if (s.trim() === '' || !Number.isFinite(n)) throw new Error(`--${name} expects numbers, got "${raw}"`);
    return n;
  });
}

/**
 * First argument that is neither a flag nor a flag's value.
 * Flags named in `booleans` take no value, so the argument after them is kept.
 */
export function positional(args: string[], booleans: readonly string[] = []): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith('--')) {
      if (booleans.includes(a.slice(2))) continue;
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) i++;
      continue;
    }
    return a;
  }
  return undefined;
}
