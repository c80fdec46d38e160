/**
 * @file errors.ts
 * @brief Error taxonomy for calendar retrieval.
 *
 * @description
 * Every failure a fetch can surface is one of these classes. The orchestrator
 * inspects them only to build the user-visible message; callers that need the
 * HTTP status read it off `ApiError`.
 *
 * @license See LICENSE.md
 */

export class PlannerCalendarError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlannerCalendarError';
  }
}

export type AuthFailure = 'noAccessToken' | 'authenticationFailed' | 'accessDenied';

const AUTH_MESSAGES: Record<AuthFailure, string> = {
  noAccessToken: 'No access token available',
  authenticationFailed: 'Failed to authenticate with Google Calendar',
  accessDenied: 'Access denied to Google Calendar'
};

export class AuthError extends PlannerCalendarError {
  constructor(public readonly reason: AuthFailure) {
    super(AUTH_MESSAGES[reason]);
    this.name = 'AuthError';
  }
}

export class NetworkError extends PlannerCalendarError {
  constructor(cause: unknown) {
    super(`Network error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'NetworkError';
  }
}

export class ApiError extends PlannerCalendarError {
  constructor(
    public readonly statusCode: number,
    public readonly body?: unknown
  ) {
    super(`Google Calendar API error: ${statusCode}`);
    this.name = 'ApiError';
  }
}

/**
 * Malformed response or cache payload. Never reaches the user: the cache treats
 * it as a miss and the client drops the offending item.
 */
export class DecodeError extends PlannerCalendarError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
