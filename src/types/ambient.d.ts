// Environment variables read by the service. Parsed and validated in utils/config.ts.

declare namespace NodeJS {
  interface ProcessEnv {
    // Environment
    NODE_ENV?: string;
    PORT?: string;

    // Storage
    OBS_STORE?: string;
    DATABASE_URL?: string;
    DB_POOL_MAX?: string;

    // JWT Authentication
    JWT_SECRET?: string;

    // CORS
    CORS_ORIGIN?: string;

    // Authorization
    ROLE_PRIVILEGES?: string;

    // Logging
    LOG_LEVEL?: string;

    // APM/Monitoring
    APM_PROVIDER?: string;
  }
}
