import { z } from "zod";
import { ConfigurationError } from "src/core/errors.ts";

// dotenv leaves unset keys from .env templates as empty strings
const optionalString = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().optional(),
);

const envSchema = z
  .object({
    APP_TITLE: z.string().default("Organization ReBAC API"),
    APP_VERSION: z.string().default("1.0.0"),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    CORS_ORIGIN: z.string().default("*"),

    STORE_DRIVER: z.enum(["memory", "postgres"]).default("memory"),
    POSTGRES_HOST: z.string().default("localhost"),
    POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
    POSTGRES_USER: z.string().default("dev"),
    POSTGRES_PASSWORD: z.string().default("password"),
    POSTGRES_DB: z.string().default("dev"),

    FGA_API_URL: z.string().url().default("http://localhost:8080"),
    FGA_STORE_ID: z
      .string({ required_error: "is required" })
      .min(1, "is required"),
    FGA_AUTHORIZATION_MODEL_ID: optionalString,
    FGA_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    FGA_CLIENT_ID: optionalString,
    FGA_CLIENT_SECRET: optionalString,
    FGA_API_AUDIENCE: optionalString,
    FGA_API_TOKEN_ISSUER: optionalString,
    FGA_API_TOKEN: optionalString,
  })
  .superRefine((env, ctx) => {
    const credentialKeys = [
      "FGA_CLIENT_ID",
      "FGA_CLIENT_SECRET",
      "FGA_API_AUDIENCE",
      "FGA_API_TOKEN_ISSUER",
    ] as const;
    const present = credentialKeys.filter((key) => env[key] !== undefined);
    if (present.length > 0 && present.length < credentialKeys.length) {
      for (const key of credentialKeys) {
        if (env[key] === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: "is required when client credentials are configured",
          });
        }
      }
    }
  });

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export type FgaCredentials =
  | {
      method: "client_credentials";
      clientId: string;
      clientSecret: string;
      apiAudience: string;
      apiTokenIssuer: string;
    }
  | { method: "api_token"; token: string };

export interface FgaConfig {
  apiUrl: string;
  storeId: string;
  authorizationModelId?: string;
  timeoutMs: number;
  credentials: FgaCredentials | null;
}

export interface PostgresConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface AppConfig {
  title: string;
  version: string;
  port: number;
  logLevel: LogLevel;
  corsOrigin: string;
  store:
    | { driver: "memory" }
    | { driver: "postgres"; postgres: PostgresConfig };
  fga: FgaConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")} ${issue.message}`,
      ),
    );
  }
  const e = parsed.data;

  let credentials: FgaCredentials | null = null;
  if (
    e.FGA_CLIENT_ID !== undefined &&
    e.FGA_CLIENT_SECRET !== undefined &&
    e.FGA_API_AUDIENCE !== undefined &&
    e.FGA_API_TOKEN_ISSUER !== undefined
  ) {
    credentials = {
      method: "client_credentials",
      clientId: e.FGA_CLIENT_ID,
      clientSecret: e.FGA_CLIENT_SECRET,
      apiAudience: e.FGA_API_AUDIENCE,
      apiTokenIssuer: e.FGA_API_TOKEN_ISSUER,
    };
  } else if (e.FGA_API_TOKEN !== undefined) {
    credentials = { method: "api_token", token: e.FGA_API_TOKEN };
  }

  return {
    title: e.APP_TITLE,
    version: e.APP_VERSION,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    store:
      e.STORE_DRIVER === "postgres"
        ? {
            driver: "postgres",
            postgres: {
              host: e.POSTGRES_HOST,
              port: e.POSTGRES_PORT,
              user: e.POSTGRES_USER,
              password: e.POSTGRES_PASSWORD,
              database: e.POSTGRES_DB,
            },
          }
        : { driver: "memory" },
    fga: {
      apiUrl: e.FGA_API_URL,
      storeId: e.FGA_STORE_ID,
      authorizationModelId: e.FGA_AUTHORIZATION_MODEL_ID,
      timeoutMs: e.FGA_TIMEOUT_MS,
      credentials,
    },
  };
}
