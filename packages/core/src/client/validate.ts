/**
 * Compiled response validators.
 */

import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { HealthcheckResponse, QueryResponse } from './types.js';
import { healthcheckResponseSchema, queryResponseSchema } from './schema_json.js';

// ajv is CommonJS; its class is the default export of module.exports.
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true });

export const validateHealthcheck: ValidateFunction<HealthcheckResponse> =
  ajv.compile<HealthcheckResponse>(healthcheckResponseSchema);

export const validateQueryResponse: ValidateFunction<QueryResponse> =
  ajv.compile<QueryResponse>(queryResponseSchema);

export function describeValidationErrors(validate: ValidateFunction): string {
  return (
    validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ') ??
    'Unknown validation error'
  );
}
