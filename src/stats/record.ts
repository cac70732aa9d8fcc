import type { TagMap } from '../tags';
import type { Attachments } from '../view/aggregation-data';
import { defaultMeter } from '../view/meter';
import type { Meter } from '../view/meter';
import type { Measurement } from './measure';

export interface RecordOptions {
  /** Meter to record into; the default meter otherwise. */
  meter?: Meter;
  tags?: TagMap;
  measurements: readonly Measurement[];
  /** Kept as the exemplar of the distribution bucket each value lands in. */
  attachments?: Attachments;
}

/**
 * Records measurements into the default meter.
 */
export function record(tags: TagMap | undefined, ...measurements: Measurement[]): void {
  defaultMeter().recordMeasurements(tags, measurements);
}

export function recordWithOptions(options: RecordOptions): void {
  const meter = options.meter ?? defaultMeter();
  meter.recordMeasurements(options.tags, options.measurements, options.attachments);
}
