import { describe, expect, test } from 'vitest';
import { escapeCsvField, toCsv } from '../../services/export/csv';
import type { ResolutionResult } from '../../services/resolution';

describe('escapeCsvField', () => {
  test('quotes fields with separators, quotes or line breaks', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('toCsv', () => {
  test('writes a header and one row per acronym', () => {
    const results: ResolutionResult[] = [
      {
        term: 'SAR',
        definition: 'Synthetic Aperture Radar',
        confidence: 0.86,
        source: 'document',
        excerpt: 'SAR – Synthetic Aperture Radar (table)',
        candidates: [{ definition: 'Synthetic Aperture Radar', confidence: 0.86, source: 'document' }],
        chosenIndex: 0,
      },
      {
        term: 'ISR',
        definition: 'Intelligence, Surveillance and Reconnaissance',
        confidence: 0.95,
        source: 'web:en.wikipedia.org',
        note: 'possible match (web)',
        candidates: [
          {
            definition: 'Intelligence, Surveillance and Reconnaissance',
            confidence: 0.95,
            source: 'web:en.wikipedia.org',
          },
        ],
        chosenIndex: 0,
      },
    ];

    expect(toCsv(results)).toBe(
      'Acronym,Definition,Confidence,Source,Note,FirstSeenExcerpt\r\n' +
        'SAR,Synthetic Aperture Radar,0.86,document,,SAR – Synthetic Aperture Radar (table)\r\n' +
        'ISR,"Intelligence, Surveillance and Reconnaissance",0.95,web:en.wikipedia.org,possible match (web),\r\n'
    );
  });

  test('writes only the header for an empty result', () => {
    expect(toCsv([])).toBe('Acronym,Definition,Confidence,Source,Note,FirstSeenExcerpt\r\n');
  });
});
