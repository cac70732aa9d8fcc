/**
 * Tags - the dimensions attached to recorded measurements.
 */

export {
  tagKey,
  isValidKeyName,
  isValidTagValue,
  compareKeys,
  MAX_TAG_LENGTH,
  type Tag,
  type TagKey,
} from './key';
export {
  TagMap,
  newTagMap,
  insert,
  update,
  upsert,
  remove,
  type Mutator,
} from './tag-map';
