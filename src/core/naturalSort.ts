const RUN_RE = /\d+|\D+/g;

function isDigitRun(run: string): boolean {
  const c = run.charCodeAt(0);
  return c >= 48 && c <= 57;
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Numeric comparison of two digit runs of any length.
function compareDigitRuns(a: string, b: string): number {
  const x = a.replace(/^0+/, "");
  const y = b.replace(/^0+/, "");
  if (x.length !== y.length) return x.length < y.length ? -1 : 1;
  return compareCodeUnits(x, y);
}

/**
 * Version-aware comparator: digit runs compare as numbers, everything else by
 * code unit, so `part9` sorts before `part10` and `partaa` before `partab`.
 * Names that only differ in zero padding fall back to a plain comparison.
 */
export function compareNatural(a: string, b: string): number {
  const ra = a.match(RUN_RE) ?? [];
  const rb = b.match(RUN_RE) ?? [];
  const n = Math.min(ra.length, rb.length);
  for (let i = 0; i < n; i++) {
    const x = ra[i] ?? "";
    const y = rb[i] ?? "";
    const xDigits = isDigitRun(x);
    const yDigits = isDigitRun(y);
    const c = xDigits && yDigits ? compareDigitRuns(x, y) : compareCodeUnits(x, y);
    if (c !== 0) return c;
  }
  if (ra.length !== rb.length) return ra.length < rb.length ? -1 : 1;
  return compareCodeUnits(a, b);
}

export function sortNatural(names: readonly string[]): string[] {
  return [...names].sort(compareNatural);
}
