import { describe, it, expect } from 'vitest';
import { newTagMap, tagKey, TagMap, upsert } from '../../tags';
import { encodeSignature, projectTags } from '../signature';

describe('projectTags', () => {
  const a = tagKey('a');
  const b = tagKey('b');

  it('should follow the key order and drop keys outside the view', () => {
    const tags = TagMap.of({ key: b, value: '2' }, { key: tagKey('other'), value: 'x' }, { key: a, value: '1' });

    expect(projectTags([a, b], tags)).toEqual([
      { key: a, value: '1' },
      { key: b, value: '2' },
    ]);
  });

  it('should project missing keys to the empty string', () => {
    expect(projectTags([a, b], newTagMap(undefined, upsert(b, 'y')))).toEqual([
      { key: a, value: '' },
      { key: b, value: 'y' },
    ]);
    expect(projectTags([a], undefined)).toEqual([{ key: a, value: '' }]);
  });
});

describe('encodeSignature', () => {
  const a = tagKey('a');
  const b = tagKey('b');

  it('should length-prefix keys and values', () => {
    expect(encodeSignature([{ key: tagKey('method'), value: 'GET' }])).toBe('6:method3:GET');
  });

  it('should encode no tags as the empty string', () => {
    expect(encodeSignature([])).toBe('');
  });

  it('should tell apart values that concatenate alike', () => {
    const first = encodeSignature([
      { key: a, value: 'x1:b' },
      { key: b, value: '' },
    ]);
    const second = encodeSignature([
      { key: a, value: 'x' },
      { key: b, value: ':b' },
    ]);

    expect(first).not.toBe(second);
  });

  it('should tell a missing value from a missing key', () => {
    expect(encodeSignature([{ key: a, value: '' }])).not.toBe(encodeSignature([]));
  });
});
