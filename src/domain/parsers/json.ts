import { z } from 'zod';
import type { EventData, EventDataValue } from '../record.js';

const jsonValueSchema: z.ZodType<EventDataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

/** A JSON object at the top level; arrays and scalars are rejected. */
export const jsonObjectSchema: z.ZodType<EventData> = z.record(z.string(), jsonValueSchema);

const NUMBER_TOKEN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const INTEGER = /^-?\d+$/;

/**
 * Wrap integer literals that a double cannot hold exactly in quotes, so
 * they reach `event_data` as their original digits. String contents are
 * left alone.
 */
export function quoteUnsafeIntegers(text: string): string {
  let result = '';
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === '"') {
      let end = i + 1;
      while (end < text.length && text[end] !== '"') {
        end += text[end] === '\\' ? 2 : 1;
      }
      result += text.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      NUMBER_TOKEN.lastIndex = i;
      const match = NUMBER_TOKEN.exec(text);
      if (match) {
        const token = match[0];
        const unsafe = INTEGER.test(token) && !Number.isSafeInteger(Number(token));
        result += unsafe ? `"${token}"` : token;
        i += token.length;
        continue;
      }
    }

    result += ch;
    i++;
  }
  return result;
}

/**
 * Parse a message that is a native JSON object after trimming.
 * Stringified JSON and partial objects are not accepted. Integers outside
 * the safe range come back as strings.
 */
export function parseJsonObject(message: string): EventData | null {
  const text = message.trim();
  if (!text.startsWith('{') || !text.endsWith('}')) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(quoteUnsafeIntegers(text));
  } catch {
    return null;
  }

  const result = jsonObjectSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
