export function getArg(name: string): string | null {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

/**
 * Pass WITHOUT the leading "--"
 * Example: hasFlag("debug") checks for "--debug"
 */
export function hasFlag(flag: string): boolean {
  return process.argv.includes(`--${flag}`);
}

export function getArgNumber(name: string, fallback: number): number {
  const v = getArg(name);
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

/** Comma-separated values, e.g. `--documentIds a,b`. */
export function getArgList(name: string): string[] | undefined {
  const v = getArg(name);
  if (v === null) return undefined;
  return v
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
