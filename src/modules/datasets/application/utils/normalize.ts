export function normalizeText(v?: unknown): string | null {
  if (v == null) return null;
  const s = String(v).trim();
  return s.length ? s : null;
}

export function normalizeKey(input: string): string {
  return input
    .trim()
    .normalize('NFKD') // separa acentos dos caracteres base
    .replace(/[\u0300-\u036f]/g, '') // remove diacríticos (acentos)
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9]+/g, '-') // tudo que não é ASCII alfanumérico vira hífen
    .replace(/(^-|-$)+/g, '') // remove hífens nas pontas
    .replace(/-+/g, '-'); // colapsa múltiplos hífens em um só
}

/**
 * Strict integer parse: optional sign and digits only, within the safe integer range.
 * Returns null for anything else (blank, decimals, thousands separators).
 */
export function parseInt64(v: unknown): number | null {
  if (typeof v === 'number') {
    return Number.isSafeInteger(v) ? v : null;
  }
  const s = normalizeText(v);
  if (!s || !/^[+-]?\d+$/.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}

export function parseFloat64(v: unknown): number | null {
  if (typeof v === 'number') {
    return Number.isFinite(v) ? v : null;
  }
  const s = normalizeText(v);
  if (!s || !/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}
