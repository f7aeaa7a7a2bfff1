/**
 * Source location helpers for V8 stack traces.
 */

/**
 * File and line of a stack frame.
 */
export interface SourceLocation {
  file: string;
  line: number;
}

export const UNKNOWN_LOCATION: SourceLocation = Object.freeze({ file: 'unknown', line: 0 });

// Matches both `at fn (file:line:col)` and `at file:line:col`
const FRAME_PATTERN = /^\s*at\s+(?:.*?\()?(.+?):(\d+):\d+\)?\s*$/;

/**
 * Extract the location of the first frame of a stack trace.
 *
 * @example
 * locate('Error: boom\n    at run (/srv/app/main.js:12:5)');
 * // { file: '/srv/app/main.js', line: 12 }
 */
export function locate(stack: string | undefined): SourceLocation {
  if (!stack) {
    return UNKNOWN_LOCATION;
  }

  for (const frame of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(frame);
    if (match?.[1] && match[2]) {
      return { file: match[1], line: Number.parseInt(match[2], 10) };
    }
  }

  return UNKNOWN_LOCATION;
}
