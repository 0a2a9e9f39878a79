export { buildGlossary, scanGlobal, scanTables } from './glossary.scanner';
export type { GlossaryMap } from './glossary.types';
