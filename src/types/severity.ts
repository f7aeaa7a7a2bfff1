/**
 * Severity flags for runtime errors.
 *
 * Runtime errors reported by the host carry exactly one flag. The host's
 * error-reporting mask is a bitwise OR of the flags it wants delivered;
 * errors whose flag is not in the mask are dropped before dispatch.
 */
export enum Severity {
  /** Fatal runtime failure reported by the host. */
  ERROR = 1,

  /** Non-fatal runtime problem (a generic process warning). */
  WARNING = 2,

  /** Informational runtime notice (e.g. experimental feature in use). */
  NOTICE = 4,

  /** Use of a deprecated API. */
  DEPRECATED = 8,
}

/**
 * Mask with every severity enabled.
 */
export const SEVERITY_ALL = 15;

const SEVERITY_NAMES: Record<string, number> = {
  ERROR: Severity.ERROR,
  WARNING: Severity.WARNING,
  NOTICE: Severity.NOTICE,
  DEPRECATED: Severity.DEPRECATED,
  ALL: SEVERITY_ALL,
};

/**
 * Check whether a severity is enabled by a mask.
 *
 * @example
 * isReported(Severity.WARNING, Severity.ERROR | Severity.WARNING); // true
 * isReported(Severity.NOTICE, Severity.ERROR);                     // false
 */
export function isReported(severity: number, mask: number): boolean {
  return (mask & severity) !== 0;
}

/**
 * Get the flag name of a severity, or `UNKNOWN` for values that are not a single flag.
 */
export function severityName(severity: number): string {
  return Severity[severity] ?? 'UNKNOWN';
}

/**
 * Map a Node.js process warning name onto a severity.
 *
 * @example
 * severityFromWarning('DeprecationWarning');  // Severity.DEPRECATED
 * severityFromWarning('MaxListenersExceededWarning'); // Severity.WARNING
 */
export function severityFromWarning(warningName: string): Severity {
  switch (warningName) {
    case 'DeprecationWarning':
      return Severity.DEPRECATED;
    case 'ExperimentalWarning':
      return Severity.NOTICE;
    default:
      return Severity.WARNING;
  }
}

/**
 * Parse an error-reporting mask.
 *
 * Accepts a decimal number or flag names joined by `|` or `,`
 * (case-insensitive, whitespace ignored).
 *
 * @returns The mask, or null when the input names an unknown flag or is not a valid number
 *
 * @example
 * parseSeverityMask('3');                 // 3
 * parseSeverityMask('error | warning');   // 3
 * parseSeverityMask('ALL');               // 15
 * parseSeverityMask('LOUD');              // null
 */
export function parseSeverityMask(input: string): number | null {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) & SEVERITY_ALL;
  }

  let mask = 0;
  for (const part of trimmed.split(/[|,]/)) {
    const name = part.trim().toUpperCase();
    if (name === '') {
      continue;
    }
    const flag = SEVERITY_NAMES[name];
    if (flag === undefined) {
      return null;
    }
    mask |= flag;
  }
  return mask;
}
