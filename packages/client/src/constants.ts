/**
 * Todo Service Constants
 *
 * Endpoint paths, header and query parameter names, and the status codes the
 * contract relies on.
 */

// ============================================================================
// Endpoints
// ============================================================================

/**
 * Collection endpoint: list (GET) and create (POST).
 */
export const TODOS_ENDPOINT = `/todos`

/**
 * Build the path of a single todo.
 * Ids are passed through as given so negative cases can send malformed ids.
 */
export function todoPath(id: number | string): string {
  return `${TODOS_ENDPOINT}/${encodeURIComponent(String(id))}`
}

/**
 * Default path of the push-notification channel.
 */
export const NOTIFICATIONS_PATH = `/ws`

// ============================================================================
// Headers
// ============================================================================

export const CONTENT_TYPE_HEADER = `content-type`
export const AUTHORIZATION_HEADER = `authorization`
export const APPLICATION_JSON = `application/json`

// ============================================================================
// Query Parameters
// ============================================================================

/**
 * Query parameter for the number of todos to skip.
 */
export const OFFSET_QUERY_PARAM = `offset`

/**
 * Query parameter for the maximum number of todos to return.
 */
export const LIMIT_QUERY_PARAM = `limit`

// ============================================================================
// Status Codes
// ============================================================================

export const STATUS_OK = 200
export const STATUS_CREATED = 201
export const STATUS_NO_CONTENT = 204
export const STATUS_BAD_REQUEST = 400
export const STATUS_UNAUTHORIZED = 401
export const STATUS_NOT_FOUND = 404
