/**
 * Injection token for the shared ioredis connection.
 *
 * String-based so a consuming module can swap the connection for a
 * stand-in without touching the service classes.
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';
