import type { ViewData, ViewExporter } from '../view';

/**
 * View exporter that keeps everything pushed to it, for assertions.
 */
export class CapturingViewExporter implements ViewExporter {
  readonly exported: ViewData[] = [];

  exportView(data: ViewData): void {
    this.exported.push(data);
  }

  /**
   * Most recent data pushed for a view.
   */
  latest(viewName: string): ViewData | undefined {
    for (let i = this.exported.length - 1; i >= 0; i--) {
      const data = this.exported[i];
      if (data && data.view.name === viewName) {
        return data;
      }
    }
    return undefined;
  }

  /**
   * Views pushed so far, in push order, repeats included.
   */
  viewNames(): string[] {
    return this.exported.map((data) => data.view.name);
  }

  clear(): void {
    this.exported.length = 0;
  }
}
