export const DEFAULT_PRECISION = 3;

/** Escape a string for use in XML text or a double-quoted attribute. */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Round to `precision` decimals and drop trailing zeros (and `-0`). */
export function formatNumber(value: number, precision = DEFAULT_PRECISION): string {
  const rounded = Number(value.toFixed(precision));
  return String(Object.is(rounded, -0) ? 0 : rounded);
}
