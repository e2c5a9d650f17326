import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load environment variables
dotenv.config({ path: join(__dirname, '../../.env') });

// Configuration schema
const configSchema = z.object({
  mqtt: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    path: z.string(),
    username: z.string().optional(),
    password: z.string().optional(),
    keepalive: z.number().int().positive(),
    connectTimeout: z.number().int().positive(),
    reconnectInterval: z.number().int().nonnegative(),
    maxPendingCommands: z.number().int().positive(),
  }),
  cloud: z.object({
    baseUrl: z.string().url(),
    accessToken: z.string().optional(),
    timeout: z.number().int().positive(),
  }),
  http: z.object({
    timeout: z.number().int().positive(),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Builds the configuration from an environment map. Throws a `ZodError`
 * when a value is out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    mqtt: {
      host: env.OASIS_MQTT_HOST || 'mqtt.grounded.so',
      port: parseInt(env.OASIS_MQTT_PORT || '8084', 10),
      path: env.OASIS_MQTT_PATH || 'mqtt',
      username: env.OASIS_MQTT_USERNAME || undefined,
      password: env.OASIS_MQTT_PASSWORD || undefined,
      keepalive: parseInt(env.OASIS_MQTT_KEEPALIVE || '30', 10),
      connectTimeout: 10000,
      reconnectInterval: parseInt(env.OASIS_RECONNECT_INTERVAL_MS || '4000', 10),
      maxPendingCommands: parseInt(env.OASIS_MAX_PENDING_COMMANDS || '10', 10),
    },
    cloud: {
      baseUrl: env.OASIS_CLOUD_URL || 'https://app.grounded.so',
      accessToken: env.OASIS_ACCESS_TOKEN || undefined,
      timeout: 30000,
    },
    http: {
      timeout: parseInt(env.OASIS_HTTP_TIMEOUT_MS || '10000', 10),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
  });
}

const config = loadConfig();

export default config;
