import { ValidationError } from '../errors';

/**
 * Maximum length of a tag key name or tag value.
 */
export const MAX_TAG_LENGTH = 255;

/**
 * Identity of a tag dimension.
 *
 * Keys compare by name; two keys created with the same name are
 * interchangeable.
 */
export interface TagKey {
  readonly name: string;
}

/**
 * One (key, value) dimension attached to a recording.
 */
export interface Tag {
  readonly key: TagKey;
  readonly value: string;
}

/**
 * Creates a tag key, validating its name.
 *
 * @throws ValidationError if the name is empty, too long or not printable ASCII
 */
export function tagKey(name: string): TagKey {
  if (!isValidKeyName(name)) {
    throw new ValidationError(
      `invalid tag key name "${name}": must be 1-${MAX_TAG_LENGTH} printable ASCII characters`,
      { field: 'key' }
    );
  }
  return Object.freeze({ name });
}

export function isValidKeyName(name: string): boolean {
  return name.length > 0 && name.length <= MAX_TAG_LENGTH && isPrintableAscii(name);
}

export function isValidTagValue(value: string): boolean {
  return value.length <= MAX_TAG_LENGTH && isPrintableAscii(value);
}

function isPrintableAscii(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code < 0x20 || code > 0x7e) {
      return false;
    }
  }
  return true;
}

/**
 * Orders keys by name, the canonical order for views and tag maps.
 */
export function compareKeys(a: TagKey, b: TagKey): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
