/**
 * Diagnostic formatting for exceptions.
 */

import type { Exception } from '../types/exception.js';

/**
 * Fields read by `format`.
 */
export type FormattableException = Pick<Exception, 'type' | 'message' | 'file' | 'line'>;

/**
 * Sink receiving formatted diagnostics.
 */
export type DiagnosticWriter = (text: string) => void;

/**
 * Build the one-line diagnostic for an exception.
 *
 * @example
 * format({ type: 'RuntimeFault', message: 'disk full', file: 'io.x', line: 42 });
 * // 'Uncaught exception RuntimeFault: "disk full" [File io.x | Line 42]'
 */
export function format(exception: FormattableException): string {
  return `Uncaught exception ${exception.type}: "${exception.message}" [File ${exception.file} | Line ${exception.line}]`;
}

const writeToStderr: DiagnosticWriter = (text) => {
  process.stderr.write(text);
};

/**
 * Create the built-in catch-all catcher, which writes the formatted
 * diagnostic and a newline.
 *
 * @param write - Output sink (defaults to standard error)
 */
export function createDefaultCatcher(
  write: DiagnosticWriter = writeToStderr
): (exception: Exception) => void {
  return (exception) => {
    write(`${format(exception)}\n`);
  };
}
