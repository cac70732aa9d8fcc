/**
 * Measures and the recording entry points.
 */

export {
  int64Measure,
  float64Measure,
  measurement,
  sameMeasure,
  UNIT_NONE,
  UNIT_DIMENSIONLESS,
  UNIT_BYTES,
  UNIT_MILLISECONDS,
  UNIT_SECONDS,
  type Measure,
  type MeasureKind,
  type Measurement,
} from './measure';
export { record, recordWithOptions, type RecordOptions } from './record';
