// ── Formatting helpers ───────────────────────────────────────────

export const DASH = "—";

export function secToHm(s: number | null): string {
  if (s == null) return DASH;
  const h = Math.floor(s / 3600);
  const m = Math.round((s % 3600) / 60);
  return m === 60 ? `${h + 1}h00m` : `${h}h${String(m).padStart(2, "0")}m`;
}

export function num(v: number | null, decimals = 0): string {
  if (v == null) return DASH;
  return decimals > 0 ? v.toFixed(decimals) : String(Math.round(v));
}

export function thousands(v: number | null): string {
  if (v == null) return DASH;
  return Math.round(v).toLocaleString("en-US");
}
