// Shared types for the Contacts Hub API and its clients

export {
  type UserId,
  UserRole,
  type PublicUser,
  type RegisterUserPayload,
  type TokenPair,
  type ChangeRolePayload,
} from './types/user.types.js';

export {
  type ContactId,
  type ContactInput,
  type Contact,
  type ContactFilter,
} from './types/contact.types.js';

export {
  type ApiResponse,
  type ApiError,
  type MessageResponse,
  type HealthCheckResponse,
  type ServiceHealth,
  type ServiceHealthMap,
} from './types/api.types.js';
