/**
 * OpenAPI response schemas shared by the route plugins
 */

export const errorResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    error: {
      type: 'object',
      properties: {
        code: { type: 'string' },
        message: { type: 'string' },
      },
    },
  },
} as const;

export function successResponseSchema<T extends object>(data: T) {
  return {
    type: 'object',
    properties: {
      success: { type: 'boolean' },
      data,
    },
  } as const;
}
