// Convert fractional odds to decimal
// e.g. 3/1 → 4.00, 10/11 → 1.909
export function fractionalToDecimal(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return Math.round((numerator / denominator + 1) * 1000) / 1000;
}

// bet365 OD fields are fractional ("10/11") on the in-play feed, decimal elsewhere
export function parsePrice(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const s = raw.trim();
  const slash = s.indexOf('/');
  if (slash !== -1) {
    const n = Number(s.slice(0, slash));
    const d = Number(s.slice(slash + 1));
    if (!Number.isFinite(n) || !Number.isFinite(d) || d === 0) return undefined;
    return fractionalToDecimal(n, d);
  }
  const dec = Number(s);
  return Number.isFinite(dec) && dec > 1 ? Math.round(dec * 1000) / 1000 : undefined;
}

export function roundToHalf(value: number): number {
  return Math.round(value * 2) / 2;
}

// Handles "O 106.5", "U106.5", "+3.5", "-3.5", "106.5"
export function parseLine(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const s = raw.trim().replace(/^[oOuU]\s*/, '').replace('+', '');
  const m = s.match(/-?\d+(\.\d+)?/);
  return m ? Number(m[0]) : undefined;
}
