/**
 * Multifeed — Telemetry Sinks
 *
 * The loader never depends on a sink being present or healthy: a missing
 * sink is a no-op and a throwing sink is logged and ignored.
 */

import { createHash } from 'crypto';
import type { TelemetryEvent, TelemetrySink, TelemetryValue } from '../types';
import { logger as rootLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { describeError } from '../lib/errors';

/**
 * SHA-256 of a sensitive value, hex encoded.
 */
export function hashPiiValue(value: TelemetryValue): string {
  return createHash('sha256').update(String(value)).digest('hex');
}

/**
 * Writes every event to the logger at info level, with PII values hashed.
 */
export function createLoggingTelemetrySink(log: Logger = rootLogger): TelemetrySink {
  const telemetryLog = log.child({ component: 'telemetry' });

  return {
    emit(event: TelemetryEvent): void {
      const pii: Record<string, string> = {};
      for (const [key, value] of Object.entries(event.piiProperties)) {
        pii[key] = hashPiiValue(value);
      }

      telemetryLog.info(event.name, { ...event.properties, ...pii });
    },
  };
}

/**
 * Emit through an optional sink.
 */
export function emitSafely(sink: TelemetrySink | undefined, event: TelemetryEvent, log: Logger = rootLogger): void {
  if (!sink) return;

  try {
    sink.emit(event);
  } catch (error) {
    log.warn('Telemetry sink failed', { event: event.name, error: describeError(error) });
  }
}
