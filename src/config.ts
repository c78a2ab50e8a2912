import { z } from "zod";

const DEFAULT_PORT = 8000;

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1).optional().catch(undefined),
  DATABASE_NAME: z.string().trim().min(1).optional().catch(undefined),
  PORT: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  ),
});

export interface DatabaseConfig {
  url: string | undefined;
  name: string | undefined;
}

export interface AppConfig {
  database: DatabaseConfig;
  port: number;
}

/**
 * Reads configuration from the environment. Blank database variables count as
 * unset; an unusable PORT is an error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${detail}`);
  }
  return {
    database: { url: parsed.data.DATABASE_URL, name: parsed.data.DATABASE_NAME },
    port: parsed.data.PORT,
  };
}
