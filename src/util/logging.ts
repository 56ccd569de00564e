import pino from 'pino';
import { scrubRecord, scrubString } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with credential redaction unless LOG_LEVEL=debug.
 * Messages are static; anything variable goes in the merge object, which is scrubbed.
 * Errors under `err` keep pino's serialization, with message and stack (causes included) scrubbed.
 */
export function createLogger(
  level: string = process.env.LOG_LEVEL ?? 'info',
  destination?: pino.DestinationStream,
): Logger {
  const redactEnabled = level !== 'debug';
  const options: pino.LoggerOptions = {
    level,
    formatters: {
      log(object) {
        return scrubRecord(object, redactEnabled);
      },
    },
    serializers: {
      err(value: Error) {
        const serialized = pino.stdSerializers.err(value);
        if (!redactEnabled || !(value instanceof Error)) return serialized;
        return {
          ...serialized,
          message: scrubString(serialized.message),
          stack: typeof serialized.stack === 'string' ? scrubString(serialized.stack) : serialized.stack,
        };
      },
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
