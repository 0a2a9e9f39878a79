export { findDefinitionInText, escapeRegExp } from './definition.matcher';
export type { DocumentMatch, DefinitionPattern } from './definition.types';
