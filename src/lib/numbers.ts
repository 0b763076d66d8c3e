// Plain decimal or exponent notation, as written by String(number)
export const NUMERIC_TEXT = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export function isNumericText(value: string): boolean {
  return NUMERIC_TEXT.test(value);
}
