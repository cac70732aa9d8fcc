/**
 * Tag projection and row signatures.
 *
 * Both are pure functions of a view's keys and the recorded tag map.
 */

import type { Tag, TagKey, TagMap } from '../tags';

/**
 * Projects a tag map onto a view's keys, in key order.
 * A key missing from the map projects to the empty string.
 */
export function projectTags(keys: readonly TagKey[], tags: TagMap | undefined): Tag[] {
  return keys.map((key) => ({ key, value: tags?.value(key) ?? '' }));
}

/**
 * Encodes projected tags as a row signature.
 *
 * Every key and value is written as `<length>:<text>`, so no choice of
 * characters inside a value can make two different tag lists encode alike.
 *
 * @example
 * ```typescript
 * encodeSignature([{ key: tagKey('method'), value: 'GET' }]) // '6:method3:GET'
 * ```
 */
export function encodeSignature(tags: readonly Tag[]): string {
  let signature = '';
  for (const tag of tags) {
    signature += `${tag.key.name.length}:${tag.key.name}${tag.value.length}:${tag.value}`;
  }
  return signature;
}
