/**
 * @gabi/core — barrel export
 *
 * Everything the CLI needs to run one query against the service.
 */

// Defaults
export { CLIENT_DEFAULTS } from './defaults.js';

// Errors
export { ClientError, ConfigurationError, ServiceError, IOError, ok, err, describeCause } from './errors.js';
export type { ClientErrorKind, Result, ServiceErrorDetails } from './errors.js';

// JSON codec
export { decodeJson, encodeJson } from './json.js';

// Logging
export { createLogger, silentLogger } from './log.js';
export type { Logger, LogNamespace, LineWriter, Verbosity } from './log.js';

// Service client
export { probe, submitQuery, endpointUrl, HEALTHY_STATUS } from './client/index.js';
export type {
  JsonValue,
  Row,
  HealthcheckResponse,
  QueryResponse,
  QueryResult,
  ServiceTarget,
  RequestOptions,
} from './client/index.js';

// Input resolution
export {
  resolveConfig,
  validateInputs,
  verbosityFromFlags,
  STDIN_SENTINEL,
  querySourceFromFlags,
  readQuerySource,
  describeSource,
  isBlankQuery,
} from './input/index.js';
export type { RawInputs, Environment, ResolvedConfig, QuerySource } from './input/index.js';

// Formatting
export {
  formatResult,
  renderRows,
  formatCsvRow,
  quoteField,
  cellText,
  separatorProblem,
  RECORD_DELIMITER,
  openSink,
  StreamSink,
  FileSink,
} from './format/index.js';
export type { FormatOptions, FormatSummary, Sink, SinkTarget } from './format/index.js';

// Orchestration
export { runInvocation } from './run.js';
export type { InvocationOutcome, InvocationIo } from './run.js';
