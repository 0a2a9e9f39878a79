import { describe, expect, test } from 'vitest';
import { bestAlignedSpan, initials, initialsAlignmentScore } from '../../services/acronyms';

describe('initials', () => {
  test('takes the first character of each alphanumeric run', () => {
    expect(initials('Synthetic Aperture Radar')).toBe('SAR');
    expect(initials('Intelligence, Surveillance and Reconnaissance')).toBe('ISAR');
    expect(initials('Synthetic-aperture radar')).toBe('SAR');
  });
});

describe('initialsAlignmentScore', () => {
  test('scores an exact expansion as 1', () => {
    expect(initialsAlignmentScore('SAR', 'Synthetic Aperture Radar')).toBe(1);
    expect(initialsAlignmentScore('sar', 'Search and Rescue')).toBe(1);
  });

  test('scores a phrase without initials as 0', () => {
    expect(initialsAlignmentScore('SAR', '')).toBe(0);
    expect(initialsAlignmentScore('SAR', ' -- ')).toBe(0);
  });

  test('combines prefix and edit similarity', () => {
    // prefix 2/3, edit similarity 2/3
    expect(initialsAlignmentScore('GPS', 'Global Positioning')).toBeCloseTo(2 / 3, 5);
  });

  test('penalizes verbose phrases', () => {
    // 0.6 + 0.4 * 0.4 - 3 * 0.02
    expect(initialsAlignmentScore('AB', 'Alpha Beta gamma delta epsilon')).toBeCloseTo(0.7, 5);
  });

  test('stays within [0, 1]', () => {
    const samples: Array<[string, string]> = [
      ['SAR', 'Zebra'],
      ['X', 'one two three four five six seven eight nine ten eleven twelve'],
      ['ABCDEFGHIJ', 'Alpha'],
      ['NATO', 'North Atlantic Treaty Organization'],
    ];
    for (const [acronym, phrase] of samples) {
      const score = initialsAlignmentScore(acronym, phrase);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe('bestAlignedSpan', () => {
  test('trims leading words before an acronym', () => {
    expect(bestAlignedSpan('SAR', 'We used Synthetic Aperture Radar', 'end')).toEqual({
      phrase: 'Synthetic Aperture Radar',
      score: 1,
    });
  });

  test('trims trailing words after an acronym', () => {
    expect(bestAlignedSpan('SAR', 'Synthetic Aperture Radar for imaging', 'start')).toEqual({
      phrase: 'Synthetic Aperture Radar',
      score: 1,
    });
  });

  test('returns an empty phrase for empty input', () => {
    expect(bestAlignedSpan('SAR', '', 'start')).toEqual({ phrase: '', score: 0 });
  });
});
