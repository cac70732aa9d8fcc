/**
 * Views - a measure aggregated along a chosen set of tag keys.
 */

import { ValidationError } from '../errors';
import type { Measure } from '../stats/measure';
import { sameMeasure } from '../stats/measure';
import { compareKeys } from '../tags';
import type { TagKey } from '../tags';
import { normalizeAggregation, sameAggregation } from './aggregation';
import type { Aggregation } from './aggregation';

export const MAX_VIEW_NAME_LENGTH = 255;

/**
 * What a caller hands to `register`. Name and description default to the
 * measure's.
 */
export interface ViewOptions {
  name?: string;
  description?: string;
  tagKeys?: readonly TagKey[];
  measure: Measure;
  aggregation: Aggregation;
}

/**
 * A registered view in canonical form.
 */
export interface View {
  readonly name: string;
  readonly description: string;
  /** Sorted by key name. */
  readonly tagKeys: readonly TagKey[];
  readonly measure: Measure;
  readonly aggregation: Aggregation;
}

/**
 * The name a view registers under.
 */
export function viewName(view: ViewOptions | View): string {
  return view.name || view.measure.name;
}

/**
 * Returns the canonical, frozen form of a view.
 *
 * @throws ValidationError if the view name is not 1-255 printable ASCII characters
 * @throws NegativeBucketBoundsError if a distribution bound is negative
 */
export function canonicalizeView(options: ViewOptions): View {
  const name = viewName(options);
  if (!isValidViewName(name)) {
    throw new ValidationError(
      `invalid view name "${name}": must be 1-${MAX_VIEW_NAME_LENGTH} printable ASCII characters`,
      { field: 'name' }
    );
  }

  const tagKeys = dedupeKeys([...(options.tagKeys ?? [])].sort(compareKeys));

  return Object.freeze({
    name,
    description: options.description || options.measure.description,
    tagKeys: Object.freeze(tagKeys),
    measure: options.measure,
    aggregation: normalizeAggregation(options.aggregation),
  });
}

/**
 * Whether two canonical views describe the same aggregation.
 */
export function sameView(a: View, b: View): boolean {
  if (a === b) return true;
  return (
    sameMeasure(a.measure, b.measure) &&
    sameAggregation(a.aggregation, b.aggregation) &&
    a.tagKeys.length === b.tagKeys.length &&
    a.tagKeys.every((key, i) => key.name === b.tagKeys[i]?.name)
  );
}

function isValidViewName(name: string): boolean {
  return name.length > 0 && name.length <= MAX_VIEW_NAME_LENGTH && /^[\x20-\x7e]+$/.test(name);
}

function dedupeKeys(sorted: TagKey[]): TagKey[] {
  return sorted.filter((key, i) => i === 0 || sorted[i - 1]?.name !== key.name);
}
