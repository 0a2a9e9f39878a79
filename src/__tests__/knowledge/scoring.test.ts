import { describe, expect, test } from 'vitest';
import { boostConfidence, classifyInitials, contextualScore } from '../../services/knowledge';

describe('classifyInitials', () => {
  test('distinguishes exact, partial and unrelated phrases', () => {
    expect(classifyInitials('SAR', 'Synthetic Aperture Radar')).toBe('exact');
    expect(classifyInitials('SAR', 'Special Administrative Region of China')).toBe('partial');
    expect(classifyInitials('SAR', 'Synthetic Aperture')).toBe('partial');
    expect(classifyInitials('SAR', 'Blue Moon')).toBe('none');
    expect(classifyInitials('SAR', '...')).toBe('none');
  });
});

describe('contextualScore', () => {
  test('rewards initials alignment', () => {
    expect(contextualScore('GPS', 'Global Positioning System', '')).toBeCloseTo(0.8, 5);
    expect(contextualScore('XYZ', 'Blue Moon', '')).toBeCloseTo(0.5, 5);
  });

  test('adds a bonus per keyword shared with the document', () => {
    expect(
      contextualScore('GNP', 'Global Network Protocol', 'The network protocol stack')
    ).toBeCloseTo(0.88, 5);
  });

  test('scores an empty definition as zero', () => {
    expect(contextualScore('SAR', '   ', 'anything')).toBe(0);
  });
});

describe('boostConfidence', () => {
  test('boosts exact initials and caps the result', () => {
    expect(boostConfidence('SAR', 'Synthetic Aperture Radar', 0.58)).toBeCloseTo(0.88, 5);
    expect(boostConfidence('SAR', 'Synthetic Aperture Radar', 0.9)).toBe(0.95);
  });

  test('leaves unrelated phrases unchanged', () => {
    expect(boostConfidence('SAR', 'Blue Moon', 0.5)).toBe(0.5);
  });
});
