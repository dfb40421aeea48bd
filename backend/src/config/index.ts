import dotenv from 'dotenv';

export interface CorsSettings {
  readonly origin: string | string[];
  readonly methods: string[];
  readonly allowedHeaders: string[];
}

export interface AppConfig {
  readonly port: number;
  readonly mongoUri: string;
  readonly nodeEnv: string;
  readonly cors: CorsSettings;
  /** Per-request access log; off under test. */
  readonly logRequests: boolean;
}

const DEFAULT_PORT = 5000;
const DEFAULT_MONGO_URI = 'mongodb://localhost:27017/trivia';

const parsePort = (value: string | undefined): number => {
  const port = Number.parseInt(value ?? '', 10);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
};

// CORS_ORIGIN is "*" or a comma-separated list of origins.
const parseOrigins = (value: string | undefined): string | string[] => {
  const raw = (value ?? '*').trim();
  if (raw === '' || raw === '*') return '*';
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const nodeEnv = env.NODE_ENV || 'development';

  return {
    port: parsePort(env.PORT),
    mongoUri: env.MONGODB_URI || DEFAULT_MONGO_URI,
    nodeEnv,
    cors: {
      origin: parseOrigins(env.CORS_ORIGIN),
      methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    },
    logRequests: nodeEnv !== 'test',
  };
};

/** Reads `.env` into `process.env`, then builds the config from it. */
export const loadConfigFromEnvFile = (): AppConfig => {
  dotenv.config();
  return loadConfig(process.env);
};
