import { describe, expect, test } from 'vitest';
import { splitSentences } from '../../services/sentences';

describe('splitSentences', () => {
  test('splits at terminal punctuation followed by a capital', () => {
    expect(splitSentences('First one. Second one! third one? Fourth.')).toEqual([
      'First one.',
      'Second one! third one?',
      'Fourth.',
    ]);
  });

  test('collapses line breaks and repeated spaces', () => {
    expect(splitSentences('Line one\nstill   one. Next')).toEqual(['Line one still one.', 'Next']);
  });

  test('returns nothing for blank text', () => {
    expect(splitSentences(' \n\t ')).toEqual([]);
  });
});
