import type { Row } from './collector';
import type { View } from './view';

/**
 * Rows of one view as pushed to exporters on each reporting tick.
 */
export interface ViewData {
  readonly view: View;
  /** When the view was registered. */
  readonly start: Date;
  readonly end: Date;
  readonly rows: readonly Row[];
}

/**
 * Receives view data periodically from a meter.
 */
export interface ViewExporter {
  exportView(data: ViewData): void;
}
