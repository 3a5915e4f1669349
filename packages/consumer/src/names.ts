import type { NameEntryZod } from '@srcmap/schemas';

/**
 * One entry of a map's `names` list. Producers normally emit strings; a few
 * emit bare numbers, which are kept as numbers until rendered.
 */
export type NameEntry =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'numeric'; readonly value: number };

export function toNameEntry(raw: NameEntryZod): NameEntry {
  return typeof raw === 'string'
    ? { kind: 'text', value: raw }
    : { kind: 'numeric', value: raw };
}

/**
 * Renders a name as text. Numbers use their shortest round-tripping decimal
 * form without an exponent (`42` → `"42"`, `1e21` → `"1000000000000000000000"`).
 * Negative zero keeps its sign.
 */
export function renderName(entry: NameEntry): string {
  switch (entry.kind) {
    case 'text':
      return entry.value;
    case 'numeric':
      return toPlainDecimal(entry.value);
  }
}

function toPlainDecimal(value: number): string {
  if (Object.is(value, -0)) {
    return '-0';
  }
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
