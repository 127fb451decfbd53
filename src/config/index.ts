import { envSchema, toConfig } from './schema.js';

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config = toConfig(parsed.data);
export type { AppConfig } from './schema.js';
