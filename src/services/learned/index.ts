export { DrizzleLearnedStore } from './learned.repository';
export type { LearnedEntry, LearnedStore } from './learned.types';
