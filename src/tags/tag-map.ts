import { ValidationError } from '../errors';
import { compareKeys, isValidTagValue, MAX_TAG_LENGTH } from './key';
import type { Tag, TagKey } from './key';

/**
 * An immutable set of tags, at most one value per key name.
 */
export class TagMap {
  private readonly entries: ReadonlyMap<string, Tag>;

  private constructor(entries: Map<string, Tag>) {
    this.entries = entries;
  }

  static empty(): TagMap {
    return EMPTY;
  }

  /**
   * Builds a tag map from plain tags; later duplicates of a key replace earlier ones.
   */
  static of(...tags: Tag[]): TagMap {
    return newTagMap(undefined, ...tags.map((t) => upsert(t.key, t.value)));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Looks up the value stored for a key.
   */
  value(key: TagKey): string | undefined {
    return this.entries.get(key.name)?.value;
  }

  has(key: TagKey): boolean {
    return this.entries.has(key.name);
  }

  /**
   * All tags, ordered by key name.
   */
  tags(): Tag[] {
    return [...this.entries.values()].sort((a, b) => compareKeys(a.key, b.key));
  }

  /** @internal */
  static fromEntries(entries: Map<string, Tag>): TagMap {
    return new TagMap(entries);
  }

  /** @internal */
  copyEntries(): Map<string, Tag> {
    return new Map(this.entries);
  }
}

const EMPTY = TagMap.fromEntries(new Map());

/**
 * A change applied while deriving a new tag map.
 */
export type Mutator =
  | { readonly op: 'insert'; readonly key: TagKey; readonly value: string }
  | { readonly op: 'update'; readonly key: TagKey; readonly value: string }
  | { readonly op: 'upsert'; readonly key: TagKey; readonly value: string }
  | { readonly op: 'remove'; readonly key: TagKey };

/** Adds the tag only when the key is absent. */
export function insert(key: TagKey, value: string): Mutator {
  return { op: 'insert', key, value };
}

/** Replaces the value only when the key is present. */
export function update(key: TagKey, value: string): Mutator {
  return { op: 'update', key, value };
}

/** Adds or replaces the tag. */
export function upsert(key: TagKey, value: string): Mutator {
  return { op: 'upsert', key, value };
}

/** Removes the key if present. */
export function remove(key: TagKey): Mutator {
  return { op: 'remove', key };
}

/**
 * Derives a new tag map from `base` by applying mutators in order.
 *
 * @throws ValidationError if a mutator carries an invalid value
 */
export function newTagMap(base: TagMap | undefined, ...mutators: Mutator[]): TagMap {
  const entries = base ? base.copyEntries() : new Map<string, Tag>();

  for (const mutator of mutators) {
    if (mutator.op !== 'remove' && !isValidTagValue(mutator.value)) {
      throw new ValidationError(
        `invalid value for tag key "${mutator.key.name}": must be at most ${MAX_TAG_LENGTH} printable ASCII characters`,
        { field: 'value' }
      );
    }

    const present = entries.has(mutator.key.name);
    switch (mutator.op) {
      case 'insert':
        if (!present) entries.set(mutator.key.name, { key: mutator.key, value: mutator.value });
        break;
      case 'update':
        if (present) entries.set(mutator.key.name, { key: mutator.key, value: mutator.value });
        break;
      case 'upsert':
        entries.set(mutator.key.name, { key: mutator.key, value: mutator.value });
        break;
      case 'remove':
        entries.delete(mutator.key.name);
        break;
    }
  }

  return TagMap.fromEntries(entries);
}
