// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  // Upload and reconciliation tuning
  MAX_UPLOAD_SIZE_MB: number;
  VARIANCE_TOLERANCE: number;
  COLLISION_POLICY: 'sum' | 'reject';
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  reconciliation: {
    collisionPolicy: EnvConfig['COLLISION_POLICY'];
    varianceTolerance: number;
    maxUploadSizeMb: number;
  };
}

// Readiness: the engine check reconciles a built-in sample ledger pair
export interface ReadinessReport {
  ready: boolean;
  checks: {
    server: boolean;
    engine: boolean;
  };
  detail: string;
}
