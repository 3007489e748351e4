/**
 * Split `count` pipe-delimited header fields off the front of `text`.
 *
 * `\|` and `\\` are unescaped inside header fields. The returned array holds
 * the `count` fields followed by everything after the last delimiter, or
 * null when fewer than `count` delimiters exist.
 */
export function splitPipeHeader(text: string, count: number): string[] | null {
  const parts: string[] = [];
  let current = '';
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    const next = text[i + 1];
    if (ch === '\\' && (next === '|' || next === '\\')) {
      current += next;
      i += 2;
      continue;
    }
    if (ch === '|') {
      parts.push(current);
      current = '';
      i++;
      if (parts.length === count) {
        parts.push(text.slice(i));
        return parts;
      }
      continue;
    }
    current += ch;
    i++;
  }

  return null;
}

const VALUE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
  s: ' ',
};

/**
 * Undo backslash escaping in a CEF or LEEF extension value: `\n`, `\r`,
 * `\t` and `\s` are control characters, any other escaped character stands
 * for itself.
 */
export function unescapeExtensionValue(value: string): string {
  if (!value.includes('\\')) return value;

  let result = '';
  let i = 0;
  while (i < value.length) {
    const ch = value.charAt(i);
    const next = value[i + 1];
    if (ch === '\\' && next !== undefined) {
      result += VALUE_ESCAPES[next] ?? next;
      i += 2;
    } else {
      result += ch;
      i++;
    }
  }
  return result;
}

/**
 * Alias `<field>Label=<name>` pairs: `name` is set to the value of `field`
 * whenever `field` exists, overwriting any earlier value of `name`, header
 * fields included. When several labels give the same name, the last one
 * wins. Empty labels are ignored.
 */
export function applyLabelAliases(fields: Map<string, string>): void {
  const aliases = new Map<string, string>();
  for (const [key, label] of fields) {
    if (!key.endsWith('Label') || key.length === 'Label'.length || label === '') continue;
    const field = key.slice(0, -'Label'.length);
    if (fields.has(field)) aliases.set(label, field);
  }
  for (const [label, field] of aliases) {
    const value = fields.get(field);
    if (value !== undefined) fields.set(label, value);
  }
}
