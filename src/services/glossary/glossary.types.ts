import type { AcronymToken } from '../acronyms';

/**
 * Acronym -> expansion found in the document itself.
 * The first expansion recorded for an acronym is kept.
 */
export type GlossaryMap = Map<AcronymToken, string>;
