/**
 * Logger public API
 */

export {
  debug,
  info,
  warn,
  error,
  withContext,
  resolveLevel,
  formatLine,
} from "./logger";
