export { createLogger, getLogLevel, setLogLevel, isLogLevel, type Logger, type LogLevel } from './logger.js';
export { shellQuote, formatCommand } from './shell.js';
export { expandPath, resolvePath, isWithin, canonicalPath } from './paths.js';
