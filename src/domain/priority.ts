/**
 * Syslog PRI helpers.
 *
 * PRI = facility * 8 + severity, written as 1-3 digits between angle
 * brackets. Valid values are 0..191.
 */

export const MAX_PRIORITY = 191;

export const FACILITY_NAMES = [
  'kern', 'user', 'mail', 'daemon', 'auth', 'syslog', 'lpr', 'news',
  'uucp', 'cron', 'authpriv', 'ftp', 'ntp', 'logaudit', 'logalert', 'clock',
  'local0', 'local1', 'local2', 'local3', 'local4', 'local5', 'local6', 'local7',
] as const;

export const SEVERITY_NAMES = [
  'emergency', 'alert', 'critical', 'error', 'warning', 'notice', 'info', 'debug',
] as const;

export type FacilityName = (typeof FACILITY_NAMES)[number];
export type SeverityName = (typeof SEVERITY_NAMES)[number];

export interface Priority {
  readonly facility: number;
  readonly severity: number;
}

/**
 * Decode the digits between `<` and `>`.
 *
 * Returns null for anything that is not a canonical PRI: empty, non-digit,
 * more than three digits, a leading zero (other than "0" itself) or a value
 * above 191.
 */
export function decodePriority(digits: string): Priority | null {
  if (!/^\d{1,3}$/.test(digits)) return null;
  if (digits.length > 1 && digits.startsWith('0')) return null;

  const value = Number(digits);
  if (value > MAX_PRIORITY) return null;

  return { facility: Math.floor(value / 8), severity: value % 8 };
}

export function encodePriority(facility: number, severity: number): number {
  if (!Number.isInteger(facility) || facility < 0 || facility >= FACILITY_NAMES.length) {
    throw new Error(`Invalid syslog facility: ${facility}`);
  }
  if (!Number.isInteger(severity) || severity < 0 || severity >= SEVERITY_NAMES.length) {
    throw new Error(`Invalid syslog severity: ${severity}`);
  }
  return facility * 8 + severity;
}

export function facilityName(facility: number | null): FacilityName | undefined {
  return facility === null ? undefined : FACILITY_NAMES[facility];
}

export function severityName(severity: number | null): SeverityName | undefined {
  return severity === null ? undefined : SEVERITY_NAMES[severity];
}
