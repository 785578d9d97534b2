/**
 * Console logging utility
 *
 * - Debug output only when NODE_ENV=development or SEGMENTATION_DEBUG=1
 * - Warnings are always visible
 *
 * Usage:
 *   import { segmentationLog } from '../lib/logger';
 *   const log = segmentationLog.child('Jump');
 *   log.debug('Detected flights', count);      // Silent unless debugging
 *   log.warn('Malformed signal table', issues); // Always visible
 */

const isDev =
  process.env.NODE_ENV === "development" ||
  process.env.SEGMENTATION_DEBUG === "1";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

function formatMessage(prefix: string, message: string): string {
  return `[${prefix}] ${message}`;
}

function createLogger(prefix: string): Logger {
  return {
    debug(message: string, ...args: unknown[]) {
      if (isDev) {
        console.debug(formatMessage(prefix, message), ...args);
      }
    },

    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message), ...args);
    },

    /**
     * Create a sub-logger with extended prefix
     */
    child(subPrefix: string) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

export const segmentationLog = createLogger("Segmentation");

export { createLogger };
