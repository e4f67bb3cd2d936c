import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables
config();

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ODM_CONFIG: z.string().optional().default('config.toml'),
  ODM_CLIENT_ID_PATH: z.string().optional().default('~/.odm-fetch.clientid'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(120000),
  USER_AGENT: z.string().optional().default('OverDrive Media Console'),
});

export type Config = z.infer<typeof configSchema>;

let appConfig: Config;

try {
  appConfig = configSchema.parse(process.env);
} catch (error) {
  if (error instanceof z.ZodError) {
    console.error('Configuration validation failed:');
    error.errors.forEach((err) => {
      console.error(`  ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }
  throw error;
}

export { appConfig as config };
