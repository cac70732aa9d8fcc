/**
 * Testing utilities: a capturing view exporter and row lookup helpers.
 */

export { CapturingViewExporter } from './capturing-exporter';
export { findRow, rowValue } from './assertions';
