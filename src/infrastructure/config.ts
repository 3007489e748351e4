import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Decoder settings resolved from the environment. */
export interface DecoderConfig {
  readonly logLevel: LogLevel;
  /** Offset from UTC assumed for timestamps that carry no zone. */
  readonly utcOffsetMinutes: number;
  /** Ids of built-in plugins that are not registered. */
  readonly disabledPlugins: readonly string[];
  /** Raw text is cut to this many characters in log lines. */
  readonly messageSampleLength: number;
}

// An empty variable counts as unset
const blankAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const envSchema = z.object({
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).default('info')),
  DECODER_UTC_OFFSET_MINUTES: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(-720).max(840).default(0),
  ),
  DECODER_DISABLED_PLUGINS: z
    .string()
    .default('')
    .transform((list) =>
      list
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id !== ''),
    ),
  DECODER_LOG_SAMPLE_LENGTH: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).max(4096).default(100),
  ),
});

/**
 * Read decoder configuration from environment variables.
 *
 * @throws listing every invalid variable
 */
export function loadDecoderConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): DecoderConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid decoder configuration: ${issues}`);
  }

  return {
    logLevel: result.data.LOG_LEVEL,
    utcOffsetMinutes: result.data.DECODER_UTC_OFFSET_MINUTES,
    disabledPlugins: result.data.DECODER_DISABLED_PLUGINS,
    messageSampleLength: result.data.DECODER_LOG_SAMPLE_LENGTH,
  };
}
