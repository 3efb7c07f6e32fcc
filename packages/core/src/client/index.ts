export { probe, HEALTHY_STATUS } from './probe.js';
export { submitQuery } from './submit.js';
export { endpointUrl } from './http.js';
export type {
  JsonValue,
  Row,
  HealthcheckResponse,
  QueryResponse,
  QueryResult,
  ServiceTarget,
  RequestOptions,
} from './types.js';
