/**
 * Tokenizer for `key=value key2="value 2"` messages.
 *
 * Tokens without `=` are skipped. Inside double quotes a backslash escapes
 * the next character. A repeated key keeps its last value.
 */
export type KeyValuePairs = ReadonlyMap<string, string>;

function isSpace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

export function parseKeyValue(message: string): KeyValuePairs | null {
  if (!message.includes('=')) return null;

  const pairs = new Map<string, string>();
  const length = message.length;
  let i = 0;

  while (i < length) {
    while (i < length && isSpace(message[i])) i++;
    if (i >= length) break;

    const keyStart = i;
    while (i < length && message[i] !== '=' && !isSpace(message[i])) i++;
    const key = message.slice(keyStart, i);

    if (key === '' || message[i] !== '=') {
      while (i < length && !isSpace(message[i])) i++;
      continue;
    }
    i++;

    let value = '';
    if (message[i] === '"') {
      i++;
      while (i < length && message[i] !== '"') {
        if (message[i] === '\\' && i + 1 < length) {
          value += message.charAt(i + 1);
          i += 2;
        } else {
          value += message.charAt(i);
          i++;
        }
      }
      i++;
    } else {
      const valueStart = i;
      while (i < length && !isSpace(message[i])) i++;
      value = message.slice(valueStart, i);
    }

    pairs.set(key, value);
  }

  return pairs.size > 0 ? pairs : null;
}
