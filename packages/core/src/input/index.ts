export { resolveConfig, validateInputs, verbosityFromFlags } from './config.js';
export type { RawInputs, Environment, ResolvedConfig } from './config.js';
export {
  STDIN_SENTINEL,
  querySourceFromFlags,
  readQuerySource,
  describeSource,
  isBlankQuery,
} from './source.js';
export type { QuerySource } from './source.js';
