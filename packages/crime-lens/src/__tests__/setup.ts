/**
 * Global Test Setup for Crime Lens
 *
 * Loggers read LOG_LEVEL when created; keep test output to errors unless
 * the caller asked for more.
 */

process.env.LOG_LEVEL ??= 'error';
