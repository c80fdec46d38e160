/**
 * @file request.ts
 * @brief Provides a wrapper for making authenticated requests to the Google Calendar API.
 *
 * @description
 * This module performs a single bearer-authenticated GET through axios and maps
 * every failure onto the engine's error taxonomy: 401/403 become `AuthError`,
 * other non-2xx statuses become `ApiError`, and anything that never produced a
 * response becomes `NetworkError`.
 *
 * @license See LICENSE.md
 */

import axios, { AxiosResponse } from 'axios';
import { ApiError, AuthError, NetworkError } from '../../types/errors';
import { logError } from '../../features/logging';

export type RequestOptions = {
  query?: Record<string, string>;
  timeoutMs?: number;
};

export function errorForStatus(status: number, body?: unknown): AuthError | ApiError {
  if (status === 401 || status === 403) {
    return new AuthError('accessDenied');
  }
  return new ApiError(status, body);
}

/**
 * Makes an authenticated GET request to a Google API endpoint.
 *
 * @param token The OAuth 2.0 access token.
 * @param url The full URL of the API endpoint.
 * @returns The parsed JSON body; validation is left to the caller.
 */
export async function makeAuthenticatedRequest(
  token: string,
  url: string,
  options: RequestOptions = {}
): Promise<unknown> {
  let response: AxiosResponse<unknown>;
  try {
    response = await axios.get<unknown>(url, {
      params: options.query,
      timeout: options.timeoutMs,
      headers: { Authorization: `Bearer ${token}` },
      // Non-2xx statuses are mapped below.
      validateStatus: () => true
    });
  } catch (e) {
    logError('Google API request failed before a response arrived.', { url });
    throw new NetworkError(e);
  }

  if (response.status < 200 || response.status >= 300) {
    logError('Google API request failed.', { url, status: response.status });
    throw errorForStatus(response.status, response.data);
  }
  return response.data;
}
