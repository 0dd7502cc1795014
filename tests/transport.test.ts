import { describe, expect, it } from 'vitest';
import { chunkText } from '../src/discord/transport';

describe('chunkText', () => {
  it('leaves short text alone', () => {
    expect(chunkText('Reminder: stretch')).toEqual(['Reminder: stretch']);
  });

  it('hard-splits text with no usable newline', () => {
    expect(chunkText('a'.repeat(10), 4)).toEqual(['aaaa', 'aaaa', 'aa']);
  });

  it('prefers to split on a newline', () => {
    expect(chunkText('ab\ncdef', 4)).toEqual(['ab', 'cdef']);
  });
});
