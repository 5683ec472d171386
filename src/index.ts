export type { FilterParams, SizingOptions } from './common/Config';
export type { FilterPlan, FilterSnapshot, FilterStats } from './common/Types';

export {
  DEFAULT_SIZING_OPTIONS,
  MAX_NUM_BITS,
  MAX_NUM_HASH_FUNCTIONS,
  resolveSizingOptions,
  validateFilterParams,
} from './common/Config';
export { FilterError, InvalidConfigError, CorruptFilterError } from './common/Errors';

export * from './hashing';
export * from './filter';
export * from './sizing';
export { parseWordList, loadWordList } from './words/WordList';
