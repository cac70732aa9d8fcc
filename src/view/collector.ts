import type { Tag, TagMap } from '../tags';
import {
  addSample,
  cloneAggregationData,
  newAggregationData,
} from './aggregation-data';
import type { AggregationData, Attachments } from './aggregation-data';
import { encodeSignature, projectTags } from './signature';
import type { View } from './view';

/**
 * One view's statistics for one combination of tag values.
 */
export interface Row {
  readonly signature: string;
  /** One entry per view key, in key order; missing keys carry ''. */
  readonly tags: readonly Tag[];
  readonly start: Date;
  readonly data: AggregationData;
}

/**
 * Row store of a single registered view.
 *
 * Recording, snapshotting and clearing are synchronous and never yield, so
 * on the event loop each of them runs to completion before the next starts:
 * lookup-or-create of a row is a single insert-if-absent and no two
 * `addSample` calls interleave on one accumulator.
 */
export class ViewCollector {
  readonly view: View;
  private readonly rows: Map<string, Row> = new Map();
  private subscribed = false;

  constructor(view: View) {
    this.view = view;
  }

  subscribe(): void {
    this.subscribed = true;
  }

  unsubscribe(): void {
    this.subscribed = false;
  }

  isSubscribed(): boolean {
    return this.subscribed;
  }

  /**
   * Folds a value into the row its projected tags select, creating the row
   * on first sight of the signature.
   */
  addSample(
    tags: TagMap | undefined,
    value: number,
    attachments: Attachments | undefined,
    timestamp: Date
  ): void {
    if (!this.subscribed) {
      return;
    }

    const projected = projectTags(this.view.tagKeys, tags);
    const signature = encodeSignature(projected);

    let row = this.rows.get(signature);
    if (!row) {
      row = {
        signature,
        tags: Object.freeze(projected),
        start: timestamp,
        data: newAggregationData(this.view.aggregation, timestamp),
      };
      this.rows.set(signature, row);
    }

    addSample(row.data, value, attachments, timestamp);
  }

  /**
   * Snapshot of every row with its accumulator cloned.
   */
  collectedRows(): Row[] {
    const snapshot: Row[] = [];
    for (const row of this.rows.values()) {
      snapshot.push({
        signature: row.signature,
        tags: row.tags,
        start: row.start,
        data: cloneAggregationData(row.data),
      });
    }
    return snapshot;
  }

  get rowCount(): number {
    return this.rows.size;
  }

  clearRows(): void {
    this.rows.clear();
  }
}
