export type UserId = string | number;

export function userIdentity(userId: UserId): string {
  return `user_${userId}`;
}

export function ipIdentity(ip: string): string {
  return `ip_${ip}`;
}

/**
 * Serialise `(cachePrefix, action, identity)` into the store key.
 */
export function composeRateLimitKey(
  cachePrefix: string,
  action: string,
  identity: string,
): string {
  return `${cachePrefix}${action}_${identity}`;
}
