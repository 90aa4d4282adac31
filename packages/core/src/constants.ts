export const HTTP_UNAUTHORIZED = 401;
export const HTTP_TOO_MANY_REQUESTS = 429;

/** Fallback identity address when no client IP can be determined. */
export const LOOPBACK_IP = '127.0.0.1';
