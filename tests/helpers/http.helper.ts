import type { ApiErrorResponse, ApiSuccessResponse } from '../../src/types/api.js';

/**
 * Read a JSON response body as the API envelope the test expects.
 */
export async function readSuccess<T>(res: Response): Promise<ApiSuccessResponse<T>> {
  return (await res.json()) as ApiSuccessResponse<T>;
}

export async function readError(res: Response): Promise<ApiErrorResponse> {
  return (await res.json()) as ApiErrorResponse;
}
