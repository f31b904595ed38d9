// src/formats/dates.ts
// Tournament dates travel as ISO yyyy-mm-dd strings.

function isRealDate(y: number, m: number, d: number): boolean {
  const dt = new Date(Date.UTC(y, m - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === m - 1 && dt.getUTCDate() === d;
}

function iso(y: number, m: number, d: number): string {
  return `${String(y).padStart(4, '0')}-${String(m).padStart(2, '0')}-${String(d).padStart(2, '0')}`;
}

/** `yyyy-mm-dd` → same string, or null when it is not a calendar date. */
export function parseIsoDate(s: string): string | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s.trim());
  if (!m) return null;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  return isRealDate(y, mo, d) ? iso(y, mo, d) : null;
}

/** `dd.mm.yyyy` → ISO, or null. */
export function parseDottedDate(s: string): string | null {
  const m = /^(\d{2})\.(\d{2})\.(\d{4})$/.exec(s.trim());
  if (!m) return null;
  const [d, mo, y] = [Number(m[1]), Number(m[2]), Number(m[3])];
  return isRealDate(y, mo, d) ? iso(y, mo, d) : null;
}

/** `yyyymmdd` (or `yyyyddmm` with order 'ydm') → ISO, or null. */
export function parseCompactDate(s: string, order: 'ymd' | 'ydm' = 'ymd'): string | null {
  const m = /^(\d{4})(\d{2})(\d{2})$/.exec(s.trim());
  if (!m) return null;
  const y = Number(m[1]);
  const [mo, d] = order === 'ymd' ? [Number(m[2]), Number(m[3])] : [Number(m[3]), Number(m[2])];
  return isRealDate(y, mo, d) ? iso(y, mo, d) : null;
}

export function toDottedDate(isoDate: string): string {
  const [y = '', m = '', d = ''] = isoDate.split('-');
  return `${d}.${m}.${y}`;
}

export function toCompactDate(isoDate: string): string {
  return isoDate.split('-').join('');
}
