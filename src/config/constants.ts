// In-document matching
const PATTERN_ALIGNMENT_THRESHOLD = 0.6;
const SHORT_ACRONYM_LENGTH = 3;
const PATTERN_CONFIDENCE_CAP = 0.98;
const FALLBACK_ALIGNMENT_THRESHOLD = 0.7;
const FALLBACK_BASE_CONFIDENCE = 0.66;
const FALLBACK_CONFIDENCE_SLOPE = 0.8;
const FALLBACK_CONFIDENCE_CAP = 0.9;
const FALLBACK_MAX_WORDS = 10;
const FALLBACK_LOOKAHEAD_SENTENCES = 2;

export const DOCUMENT_PATTERN_SCORES = {
  longFormThenAcronym: 0.95,
  acronymThenLongForm: 0.9,
  acronymDashLongForm: 0.85,
  acronymStandsFor: 0.85,
} as const;

// Candidate merging
const GLOSSARY_CONFIDENCE = 0.86;
const EXCERPT_MAX_LENGTH = 240;
const CONTEXT_TEXT_LENGTH = 4000;
const NO_DEFINITION_TEXT = '(no definition found)';
const WEB_MATCH_NOTE = 'possible match (web)';

// Knowledge lookup scoring
const EXACT_INITIALS_BOOST = 0.3;
const PARTIAL_INITIALS_BOOST = 0.15;
const BOOSTED_CONFIDENCE_CAP = 0.95;
const CONTEXT_KEYWORD_BONUS = 0.04;
const CONTEXT_WINDOW_LENGTH = 500;
const NORMALIZED_PHRASE_MIN_WORDS = 2;
const NORMALIZED_PHRASE_MAX_WORDS = 8;
const SLIDING_WINDOW_MAX_TOKENS = 8;

// Terms whose presence in both the document and a candidate nudges the candidate up
export const CONTEXT_KEYWORDS = [
  'computer',
  'data',
  'network',
  'law',
  'regulation',
  'europe',
  'united',
  'states',
  'protocol',
  'web',
  'page',
  'pdf',
  'memory',
  'processor',
  'graphics',
  'artificial',
  'intelligence',
  'health',
  'organization',
  'university',
  'union',
  'nation',
] as const;

// Outbound HTTP
const HTTP_MAX_ATTEMPTS = 3;
const HTTP_BACKOFF_BASE_MS = 150;
const HTTP_BACKOFF_CAP_MS = 1500;
const HTTP_BACKOFF_JITTER_MS = 100;

export {
  PATTERN_ALIGNMENT_THRESHOLD,
  SHORT_ACRONYM_LENGTH,
  PATTERN_CONFIDENCE_CAP,
  FALLBACK_ALIGNMENT_THRESHOLD,
  FALLBACK_BASE_CONFIDENCE,
  FALLBACK_CONFIDENCE_SLOPE,
  FALLBACK_CONFIDENCE_CAP,
  FALLBACK_MAX_WORDS,
  FALLBACK_LOOKAHEAD_SENTENCES,
  GLOSSARY_CONFIDENCE,
  EXCERPT_MAX_LENGTH,
  CONTEXT_TEXT_LENGTH,
  NO_DEFINITION_TEXT,
  WEB_MATCH_NOTE,
  EXACT_INITIALS_BOOST,
  PARTIAL_INITIALS_BOOST,
  BOOSTED_CONFIDENCE_CAP,
  CONTEXT_KEYWORD_BONUS,
  CONTEXT_WINDOW_LENGTH,
  NORMALIZED_PHRASE_MIN_WORDS,
  NORMALIZED_PHRASE_MAX_WORDS,
  SLIDING_WINDOW_MAX_TOKENS,
  HTTP_MAX_ATTEMPTS,
  HTTP_BACKOFF_BASE_MS,
  HTTP_BACKOFF_CAP_MS,
  HTTP_BACKOFF_JITTER_MS,
};
