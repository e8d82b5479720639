/**
 * Type definitions barrel export
 */

export type {
  ResponseMeta,
  ApiSuccessResponse,
  ApiErrorResponse,
  ApiResponse,
} from './api.js';

import type { AuthUser } from '../middleware/auth.js';

// Context variables shared by the app, its middleware and its routers
export type AppVariables = {
  requestId: string;
  user: AuthUser;
};

export type AppEnv = { Variables: AppVariables };
