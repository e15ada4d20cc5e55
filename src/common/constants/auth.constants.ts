export const AUTH_CONSTANTS = {
  TOKEN_ALGORITHM: 'HS256',
  RESET_TOKEN_ALGORITHM: 'HS512',

  PASSWORD_MIN_LENGTH: 8,
  PASSWORD_MAX_LENGTH: 100,

  AVATAR_MAX_BYTES: 5 * 1024 * 1024,
  AVATAR_MIME_TYPES: ['image/jpeg', 'image/png', 'image/gif', 'image/webp'],
} as const;

export const CACHE_KEYS = {
  USER_PROFILE: (userId: number): string => `user:${userId}`,
  PASSWORD_RESET: (jti: string): string => `reset:${jti}`,
};
