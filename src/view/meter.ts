/**
 * The meter owns the table of registered views and routes every recorded
 * value to the views of its measure.
 *
 * Registration is all-or-nothing and is the only operation that throws.
 * Recording never throws: a value that cannot be recorded is dropped and
 * logged at debug level.
 */

import { formatError, RegistrationError, ViewNotFoundError } from '../errors';
import { NoopLogger } from '../logging';
import type { Logger } from '../logging';
import type { Measure, Measurement } from '../stats/measure';
import type { TagMap } from '../tags';
import type { Attachments } from './aggregation-data';
import { ViewCollector } from './collector';
import type { Row } from './collector';
import type { ViewData, ViewExporter } from './export';
import { canonicalizeView, sameView, viewName } from './view';
import type { View, ViewOptions } from './view';

/**
 * Default interval between pushes to registered view exporters.
 */
export const DEFAULT_REPORTING_PERIOD_MS = 10_000;

export interface MeterOptions {
  logger?: Logger;
  reportingPeriodMs?: number;
  /** Clock used when a recording carries no timestamp. */
  now?: () => Date;
}

/**
 * A view, by its canonical form, its registration options, or its name.
 */
export type ViewRef = View | ViewOptions | string;

interface Registration {
  readonly collector: ViewCollector;
  readonly registeredAt: Date;
}

export class Meter {
  private readonly registrations: Map<string, Registration> = new Map();
  private readonly byMeasure: Map<string, Set<ViewCollector>> = new Map();
  private readonly exporters: Set<ViewExporter> = new Set();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private reportingPeriodMs: number;
  private timer: NodeJS.Timeout | undefined;

  constructor(options: MeterOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? (() => new Date());
    this.reportingPeriodMs = positiveOr(options.reportingPeriodMs, DEFAULT_REPORTING_PERIOD_MS);
  }

  /**
   * Registers views and starts aggregating their measures.
   *
   * Registering a view identical to one already registered under its name is
   * a no-op. Nothing is registered when any of the views fails validation.
   *
   * @throws ValidationError if a view name is invalid
   * @throws NegativeBucketBoundsError if a distribution bound is negative
   * @throws RegistrationError if a different view already uses the name
   */
  register(...views: ViewOptions[]): void {
    const pending = new Map<string, View>();

    for (const options of views) {
      const view = canonicalizeView(options);
      const existing = this.registrations.get(view.name)?.collector.view ?? pending.get(view.name);
      if (existing && !sameView(existing, view)) {
        throw new RegistrationError(
          `cannot register view "${view.name}"; a different view with the same name is already registered`,
          { viewName: view.name }
        );
      }
      if (!existing) {
        pending.set(view.name, view);
      }
    }

    for (const view of pending.values()) {
      const collector = new ViewCollector(view);
      collector.subscribe();
      this.registrations.set(view.name, { collector, registeredAt: this.now() });

      let collectors = this.byMeasure.get(view.measure.name);
      if (!collectors) {
        collectors = new Set();
        this.byMeasure.set(view.measure.name, collectors);
      }
      collectors.add(collector);
      this.logger.debug('view registered', { view: view.name, measure: view.measure.name });
    }
  }

  /**
   * Removes views and discards their rows. Unknown views are ignored.
   */
  unregister(...views: ViewRef[]): void {
    for (const ref of views) {
      const name = refName(ref);
      const registration = this.registrations.get(name);
      if (!registration) continue;

      const { collector } = registration;
      collector.unsubscribe();
      collector.clearRows();
      this.registrations.delete(name);

      const collectors = this.byMeasure.get(collector.view.measure.name);
      collectors?.delete(collector);
      if (collectors && collectors.size === 0) {
        this.byMeasure.delete(collector.view.measure.name);
      }
      this.logger.debug('view unregistered', { view: name });
    }
  }

  /**
   * The registered view with this name, in canonical form.
   */
  find(name: string): View | undefined {
    return this.registrations.get(name)?.collector.view;
  }

  /**
   * All registered views, ordered by name.
   */
  views(): View[] {
    return [...this.registrations.values()]
      .map((registration) => registration.collector.view)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Folds a value into every subscribed view of the measure.
   */
  record(
    tags: TagMap | undefined,
    measure: Measure,
    value: number,
    attachments?: Attachments,
    timestamp?: Date
  ): void {
    if (!Number.isFinite(value)) {
      this.logger.debug('dropping non-finite measurement', { measure: measure.name, value });
      return;
    }

    const collectors = this.byMeasure.get(measure.name);
    if (!collectors) {
      return;
    }

    const at = timestamp ?? this.now();
    for (const collector of collectors) {
      try {
        collector.addSample(tags, value, attachments, at);
      } catch (error) {
        this.logger.debug('dropping measurement', {
          view: collector.view.name,
          measure: measure.name,
          error: formatError(error),
        });
      }
    }
  }

  /**
   * Records several measurements sharing tags, attachments and timestamp.
   */
  recordMeasurements(
    tags: TagMap | undefined,
    measurements: readonly Measurement[],
    attachments?: Attachments
  ): void {
    const at = this.now();
    for (const { measure, value } of measurements) {
      this.record(tags, measure, value, attachments, at);
    }
  }

  /**
   * Snapshot of the rows of a view; empty when the view is not registered.
   */
  collectedRows(ref: ViewRef): Row[] {
    return this.registrations.get(refName(ref))?.collector.collectedRows() ?? [];
  }

  /**
   * Snapshot of the rows of a registered view.
   *
   * @throws ViewNotFoundError if no view has this name
   */
  retrieveData(name: string): Row[] {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new ViewNotFoundError(name);
    }
    return registration.collector.collectedRows();
  }

  /**
   * Discards the rows of a view while keeping it registered.
   */
  clearRows(ref: ViewRef): void {
    this.registrations.get(refName(ref))?.collector.clearRows();
  }

  registerExporter(exporter: ViewExporter): void {
    this.exporters.add(exporter);
  }

  unregisterExporter(exporter: ViewExporter): void {
    this.exporters.delete(exporter);
  }

  /**
   * Changes the push interval; non-positive values restore the default.
   * A running reporter is restarted with the new interval.
   */
  setReportingPeriod(ms: number): void {
    this.reportingPeriodMs = positiveOr(ms, DEFAULT_REPORTING_PERIOD_MS);
    if (this.timer) {
      this.stop();
      this.start();
    }
  }

  getReportingPeriod(): number {
    return this.reportingPeriodMs;
  }

  /**
   * Starts pushing view data to registered exporters every reporting period.
   * The timer does not keep the process alive.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.flush(), this.reportingPeriodMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  /**
   * Pushes the current data of every view to every exporter once.
   */
  flush(): void {
    if (this.exporters.size === 0) return;

    const end = this.now();
    for (const { collector, registeredAt } of this.registrations.values()) {
      const data: ViewData = {
        view: collector.view,
        start: registeredAt,
        end,
        rows: collector.collectedRows(),
      };
      for (const exporter of this.exporters) {
        try {
          exporter.exportView(data);
        } catch (error) {
          this.logger.warn('view exporter failed', {
            view: collector.view.name,
            error: formatError(error),
          });
        }
      }
    }
  }
}

function refName(ref: ViewRef): string {
  return typeof ref === 'string' ? ref : viewName(ref);
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

let defaultInstance: Meter | undefined;

/**
 * The process-wide meter used by the top-level helpers.
 */
export function defaultMeter(): Meter {
  if (!defaultInstance) {
    defaultInstance = new Meter();
  }
  return defaultInstance;
}

/**
 * Registers views with the default meter.
 */
export function register(...views: ViewOptions[]): void {
  defaultMeter().register(...views);
}

/**
 * Unregisters views from the default meter.
 */
export function unregister(...views: ViewRef[]): void {
  defaultMeter().unregister(...views);
}

/**
 * Finds a view registered with the default meter.
 */
export function find(name: string): View | undefined {
  return defaultMeter().find(name);
}

/**
 * Rows of a view registered with the default meter.
 */
export function retrieveData(name: string): Row[] {
  return defaultMeter().retrieveData(name);
}
