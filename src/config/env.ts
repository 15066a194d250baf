import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PORT: z.coerce.number().default(4000),
  MONGO_URI: z.string().min(1),
  REDIS_URL: z.string().min(1),
  CORS_ORIGIN: z.string().default("*"),
  ADMIN_TOKEN: z.string().optional().default(""),
  CONTRACT_ID: z.string().regex(/^[0-9a-f]{64}$/, "CONTRACT_ID must be 64 lowercase hex characters"),
  INVOCATION_LOCK_TTL_MS: z.coerce.number().int().positive().default(5000),
  BUY_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(10000),
  BUY_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(20)
});

export type Env = z.infer<typeof EnvSchema>;

export const env = EnvSchema.parse(process.env);
