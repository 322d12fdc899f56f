import { z } from "zod";

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional(),
);

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().positive().default(5000),
    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: optionalString,
    PRIMARY_GUILD_ID: optionalString.pipe(z.string().regex(/^\d{1,32}$/, "PRIMARY_GUILD_ID must be a guild snowflake").optional()),
    LEDGER_ADMIN_API_KEY: optionalString,
    LEDGER_PUBLIC_API_KEY: optionalString,
    LEDGER_ALLOWED_ORIGINS: z.string().default(""),
    ANILIST_API_URL: z.string().url().default("https://graphql.anilist.co"),
    SNAPSHOT_CACHE_HOURS: z.coerce.number().nonnegative().default(12),
    DISCORD_TOKEN: optionalString,
    COMPLETION_DISPATCH_ENABLED: z.enum(["true", "false"]).default("false"),
    COMPLETION_DISPATCH_CRON: z.string().default("*/1 * * * *"),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORAGE_DRIVER=postgres",
      });
    }
  });

export interface LedgerConfig {
  env: "development" | "production" | "test";
  port: number;
  storageDriver: "postgres" | "memory";
  databaseUrl: string | undefined;
  /** Legacy single-guild deployments: the community used when a request names none. */
  primaryCommunityId: string | undefined;
  adminApiKey: string | undefined;
  publicApiKey: string | undefined;
  allowedOrigins: string[];
  anilistApiUrl: string;
  snapshotCacheHours: number;
  discordToken: string | undefined;
  completionDispatch: {
    enabled: boolean;
    cron: string;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    storageDriver: env.STORAGE_DRIVER,
    databaseUrl: env.DATABASE_URL,
    primaryCommunityId: env.PRIMARY_GUILD_ID,
    adminApiKey: env.LEDGER_ADMIN_API_KEY,
    publicApiKey: env.LEDGER_PUBLIC_API_KEY,
    allowedOrigins: env.LEDGER_ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean),
    anilistApiUrl: env.ANILIST_API_URL,
    snapshotCacheHours: env.SNAPSHOT_CACHE_HOURS,
    discordToken: env.DISCORD_TOKEN,
    completionDispatch: {
      enabled: env.COMPLETION_DISPATCH_ENABLED === "true",
      cron: env.COMPLETION_DISPATCH_CRON,
    },
  };
}
