/**
 * Availability probe: GET {url}/healthcheck must answer { "status": "OK" }.
 */

import { ServiceError, err, ok, type Result } from '../errors.js';
import { encodeJson } from '../json.js';
import { endpointUrl, expectShape, requestJson } from './http.js';
import type { HealthcheckResponse, RequestOptions, ServiceTarget } from './types.js';
import { validateHealthcheck } from './validate.js';

export const HEALTHY_STATUS = 'OK';

export async function probe(
  target: ServiceTarget,
  options: RequestOptions = {},
): Promise<Result<HealthcheckResponse, ServiceError>> {
  const response = await requestJson('GET', target, 'healthcheck', undefined, options);
  if (!response.ok) return response;

  const url = endpointUrl(target.url, 'healthcheck');
  const health = expectShape(validateHealthcheck, response.value, url);
  if (!health.ok) return health;

  if (health.value.status !== HEALTHY_STATUS) {
    return err(
      new ServiceError(`Service is not available: healthcheck reported status "${health.value.status}"`, {
        url,
        body: encodeJson(health.value),
      }),
    );
  }
  return ok(health.value);
}
