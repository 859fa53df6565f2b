/** SQL for a CHECK that restricts `column` to a fixed set of strings. */
export function oneOf(column: string, values: readonly string[], nullable = false): string {
  const list = values.map(v => `'${v}'`).join(', ');
  const check = `"${column}" IN (${list})`;
  return nullable ? `"${column}" IS NULL OR ${check}` : check;
}
