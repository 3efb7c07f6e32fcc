/**
 * AJV JSON Schemas for service responses.
 * Plain object schemas; cell values are left unconstrained.
 */

export const healthcheckResponseSchema = {
  type: 'object' as const,
  properties: {
    status: { type: 'string' as const },
  },
  required: ['status'] as const,
};

export const queryResponseSchema = {
  type: 'object' as const,
  properties: {
    result: {
      type: 'array' as const,
      nullable: true,
      items: { type: 'array' as const },
    },
    error: { type: 'string' as const, nullable: true },
  },
};
