/**
 * API request/response types for the Contacts Hub API.
 */

/** Standard API response wrapper */
export interface ApiResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: ApiError;
}

/** API error structure */
export interface ApiError {
  readonly code: string;
  readonly message: string;
}

/** Plain acknowledgement body */
export interface MessageResponse {
  readonly message: string;
}

/** Health check response */
export interface HealthCheckResponse {
  readonly status: 'healthy' | 'degraded' | 'unhealthy';
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly services: ServiceHealthMap;
}

/** Individual service health */
export interface ServiceHealth {
  readonly status: 'up' | 'down';
  readonly latencyMs?: number;
  readonly message?: string;
}

/** Map of service health checks */
export interface ServiceHealthMap {
  readonly postgres: ServiceHealth;
  readonly redis: ServiceHealth;
}
