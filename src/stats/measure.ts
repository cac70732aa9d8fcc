/**
 * Measures - named quantities that views aggregate.
 */

import { ValidationError } from '../errors';

export const UNIT_NONE = '1';
export const UNIT_DIMENSIONLESS = UNIT_NONE;
export const UNIT_BYTES = 'By';
export const UNIT_MILLISECONDS = 'ms';
export const UNIT_SECONDS = 's';

export type MeasureKind = 'int64' | 'float64';

/**
 * A value of a measure, ready to be recorded.
 */
export interface Measurement {
  readonly measure: Measure;
  readonly value: number;
}

/**
 * Identity of a measured quantity.
 */
export interface Measure {
  readonly name: string;
  readonly description: string;
  readonly unit: string;
  readonly kind: MeasureKind;

  /** Wraps a value of this measure into a measurement. */
  m(value: number): Measurement;
}

const measures = new Map<string, Measure>();

function createMeasure(name: string, description: string, unit: string, kind: MeasureKind): Measure {
  const existing = measures.get(name);
  if (existing) {
    if (existing.kind !== kind) {
      throw new ValidationError(`measure "${name}" already exists as ${existing.kind}`, { field: 'name' });
    }
    return existing;
  }

  const measure: Measure = {
    name,
    description,
    unit,
    kind,
    m(value: number): Measurement {
      return measurement(measure, value);
    },
  };
  measures.set(name, Object.freeze(measure));
  return measure;
}

/**
 * Creates an integer measure; recorded values are truncated toward zero.
 * A measure with the same name created earlier is returned as is.
 *
 * @throws ValidationError if the name is taken by a float64 measure
 */
export function int64Measure(name: string, description: string, unit: string = UNIT_NONE): Measure {
  return createMeasure(name, description, unit, 'int64');
}

/**
 * Creates a floating point measure.
 * A measure with the same name created earlier is returned as is.
 *
 * @throws ValidationError if the name is taken by an int64 measure
 */
export function float64Measure(name: string, description: string, unit: string = UNIT_NONE): Measure {
  return createMeasure(name, description, unit, 'float64');
}

export function measurement(measure: Measure, value: number): Measurement {
  return {
    measure,
    value: measure.kind === 'int64' ? Math.trunc(value) : value,
  };
}

/**
 * Two measures are the same quantity when their names match.
 */
export function sameMeasure(a: Measure, b: Measure): boolean {
  return a === b || a.name === b.name;
}
