/**
 * Core types: exceptions, severities and source locations.
 */

export {
  Exception,
  type ExceptionClass,
  type ExceptionOptions,
  ForeignException,
  isExceptionClass,
  ROOT_EXCEPTION_TYPE,
  RuntimeErrorException,
  typeNameOf,
} from './exception.js';
export {
  isReported,
  parseSeverityMask,
  Severity,
  SEVERITY_ALL,
  severityFromWarning,
  severityName,
} from './severity.js';
export { locate, type SourceLocation, UNKNOWN_LOCATION } from './stack-location.js';
