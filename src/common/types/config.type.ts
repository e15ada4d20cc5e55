/**
 * AppConfig
 *
 * Single source of truth for every configuration key used in the application.
 * Each field maps 1-to-1 to a key returned by configuration.ts and consumed
 * via ConfigService.get<T>('section.key').
 *
 * Keep in sync with:
 *  - src/config/configuration.ts   (the factory)
 *  - .env.example                  (the env reference)
 */

export type CacheDriver = 'redis' | 'memory' | 'none';

export type AppConfig = {
  // ─── Application ───────────────────────────────────────────────────────────
  app: {
    /** Human-readable application name. Used in emails and logs. */
    name: string;
    /** Reported by GET /api/health. */
    version: string;
    /** HTTP port the server listens on. */
    port: number;
    /** Runtime environment: 'development' | 'test' | 'production' */
    env: string;
    /**
     * Externally reachable base URL of this API, without trailing slash.
     * Used to build verification and reset links sent by email.
     */
    publicUrl: string;
  };

  // ─── Internationalisation ──────────────────────────────────────────────────
  i18n: {
    /** BCP-47 language tag used when no match is found, e.g. 'en'. */
    defaultLanguage: string;
  };

  // ─── Database ──────────────────────────────────────────────────────────────
  database: {
    /** Full PostgreSQL connection string. */
    url: string;
    /** Log every SQL statement TypeORM issues. */
    logging: boolean;
  };

  // ─── JWT ───────────────────────────────────────────────────────────────────
  jwt: {
    /** Signing secret shared by access and email-verification tokens. */
    secret: string;

    /** Access token lifetime in seconds. */
    expiresIn: number;

    /** Email-verification token lifetime in seconds. */
    verificationExpiresIn: number;
  };

  // ─── Password reset ────────────────────────────────────────────────────────
  passwordReset: {
    /**
     * Independent signing secret. Never equal to `jwt.secret` in production,
     * so a leak of one token family does not compromise the other.
     */
    secret: string;
    /** Maximum token age in seconds; also the TTL of the JTI record. */
    expiresIn: number;
  };

  // ─── CORS ──────────────────────────────────────────────────────────────────
  cors: {
    /** Allowed origins for cross-origin requests. */
    origins: string[];
  };

  // ─── Mail ──────────────────────────────────────────────────────────────────
  mail: {
    /** SMTP host. Empty disables outbound mail. */
    host: string;
    /** SMTP port: 465 (SSL), 587 (STARTTLS) or 1025 (local catcher). */
    port: number;
    /** SMTP authentication username. Optional for local catchers. */
    user: string;
    /** SMTP authentication password. */
    password: string;
    /** RFC-5322 From header, e.g. '"Contacts API" <noreply@example.com>'. */
    from: string;
  };

  // ─── Cache ─────────────────────────────────────────────────────────────────
  cache: {
    /**
     * Backend of the profile cache.
     *  - redis  : shared Redis instance (production)
     *  - memory : per-process map (development, tests)
     *  - none   : no cache; every lookup goes to the database
     */
    driver: CacheDriver;
    /** TTL in seconds of cached user profile snapshots. Default: 900. */
    userTtl: number;
    /** Maximum number of items held by the in-memory backend. Default: 500. */
    max: number;
    /** Interval in milliseconds between sweeps of expired in-memory entries. */
    cleanupInterval: number;
    redis: {
      /** Full Redis connection URL, e.g. 'redis://localhost:6379/0'. */
      url: string | null;
    };
  };

  // ─── Avatar storage ────────────────────────────────────────────────────────
  storage: {
    endpoint: string;
    port: number;
    useSSL: boolean;
    accessKey: string;
    secretKey: string;
    bucket: string;
    /** Base URL under which stored objects are publicly readable. */
    publicUrl: string;
  };
};
