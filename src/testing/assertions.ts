/**
 * Row lookup helpers for tests.
 */

import { AggregationType } from '../view';
import type { Row } from '../view';

/**
 * Finds the row whose tags carry exactly these values, keyed by tag key name.
 */
export function findRow(rows: readonly Row[], values: Record<string, string>): Row | undefined {
  return rows.find(
    (row) =>
      row.tags.length === Object.keys(values).length &&
      row.tags.every((tag) => values[tag.key.name] === tag.value)
  );
}

/**
 * The scalar value of a count, sum or last value row; the count of a
 * distribution row.
 *
 * @throws Error if no row carries these values
 */
export function rowValue(rows: readonly Row[], values: Record<string, string> = {}): number {
  const row = findRow(rows, values);
  if (!row) {
    throw new Error(`no row with tags ${JSON.stringify(values)}`);
  }
  return row.data.type === AggregationType.Distribution ? row.data.count : row.data.value;
}
