/**
 * Structured Logger
 *
 * Creates a pino-based logger shared across all components. Components derive
 * a child logger tagged with their name. The CLI sends log lines to stderr so
 * stdout only carries command results.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info', destination?: pino.DestinationStream): Logger {
  return destination ? pino({ level }, destination) : pino({ level })
}

/**
 * Logger that discards everything (tests, library callers without logging).
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
