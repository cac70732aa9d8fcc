/**
 * Views, their aggregations and the meter that registers them.
 */

export {
  AggregationType,
  count,
  sum,
  lastValue,
  distribution,
  normalizeBuckets,
  normalizeAggregation,
  sameAggregation,
  type Aggregation,
  type DistributionAggregation,
} from './aggregation';
export {
  addSample,
  bucketIndex,
  cloneAggregationData,
  distributionSum,
  distributionVariance,
  newAggregationData,
  type AggregationData,
  type Attachments,
  type CountData,
  type DistributionData,
  type Exemplar,
  type LastValueData,
  type SumData,
} from './aggregation-data';
export { encodeSignature, projectTags } from './signature';
export {
  canonicalizeView,
  sameView,
  viewName,
  MAX_VIEW_NAME_LENGTH,
  type View,
  type ViewOptions,
} from './view';
export { ViewCollector, type Row } from './collector';
export type { ViewData, ViewExporter } from './export';
export {
  Meter,
  defaultMeter,
  register,
  unregister,
  find,
  retrieveData,
  DEFAULT_REPORTING_PERIOD_MS,
  type MeterOptions,
  type ViewRef,
} from './meter';
