/**
 * Multifeed — Telemetry Types v1.0
 *
 * Named events with plain properties plus a separate bag of values that are
 * personal or sensitive (search text). Delivery is the sink's concern.
 */

export type TelemetryValue = string | number | boolean;

export interface TelemetryEvent {
  readonly name: string;
  readonly properties: Readonly<Record<string, TelemetryValue>>;
  /** Values that must be hashed or dropped before leaving the process */
  readonly piiProperties: Readonly<Record<string, TelemetryValue>>;
}

export interface TelemetrySink {
  emit(event: TelemetryEvent): void;
}

export type SearchEventName = 'Search' | 'SearchPackageSourceSummary' | 'SearchPage';
