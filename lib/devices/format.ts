/**
 * Command formatting helpers
 */

export type TemplateValues = Record<string, string>;

const PLACEHOLDER = /\{(\w+)\}/g;

/** Names of the `{name}` placeholders in a template. */
export function templateFields(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map(m => m[1]);
}

/** Fill `{name}` placeholders. Unknown names are left as written. */
export function formatTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (whole, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : whole
  );
}

/**
 * Scientific notation with six fraction digits and a two-digit exponent,
 * e.g. 1 -> "1.000000e+00", 0.00025 -> "2.500000e-04".
 */
export function formatScientific(value: number): string {
  return value.toExponential(6).replace(/e([+-])(\d)$/, (_m, sign: string, digit: string) => `e${sign}0${digit}`);
}

/** Shortest decimal form that always shows a fraction: 4 -> "4.0", 3.25 -> "3.25". */
export function formatDecimal(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Number.isInteger(value) && Math.abs(value) < 1e16) return value.toFixed(1);
  return String(value);
}

/** Integer form; callers validate integrality first. */
export function formatInteger(value: number): string {
  return value.toFixed(0);
}
