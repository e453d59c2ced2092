import { z } from 'zod';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const flag = z
  .string()
  .optional()
  .transform((value) => TRUTHY.has(String(value ?? '').trim().toLowerCase()));

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().max(65535).default(3000),
    DATABASE_URL: z.string().min(1).optional(),
    LEDGER_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    LEDGER_LOCK_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
    RUN_INPROCESS_JOBS: flag,
    ENABLE_SCHEDULER: flag,
    ANALYTICS_REFRESH_CRON: z.string().min(1).default('0 * * * *'),
    ANALYTICS_SOURCE_CSV: z.string().min(1).default('data/supply_chain_data.csv'),
    OTEL_ENABLED: flag,
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
    OTEL_SERVICE_NAME: z.string().min(1).default('stock-ledger-api')
  })
  .superRefine((env, ctx) => {
    if (env.LEDGER_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL must be set when LEDGER_STORE=postgres'
      });
    }
  });

export type AppConfig = {
  nodeEnv: string;
  port: number;
  databaseUrl: string | null;
  ledgerStore: 'postgres' | 'memory';
  lockTimeoutMs: number;
  runInProcessJobs: boolean;
  enableScheduler: boolean;
  analytics: {
    refreshCron: string;
    sourceCsvPath: string;
  };
  telemetry: {
    enabled: boolean;
    endpoint: string | null;
    serviceName: string;
  };
};

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const data = parsed.data;
  return {
    nodeEnv: data.NODE_ENV,
    port: data.PORT,
    databaseUrl: data.DATABASE_URL ?? null,
    ledgerStore: data.LEDGER_STORE,
    lockTimeoutMs: data.LEDGER_LOCK_TIMEOUT_MS,
    runInProcessJobs: data.RUN_INPROCESS_JOBS,
    enableScheduler: data.ENABLE_SCHEDULER,
    analytics: {
      refreshCron: data.ANALYTICS_REFRESH_CRON,
      sourceCsvPath: data.ANALYTICS_SOURCE_CSV
    },
    telemetry: {
      // Any configured exporter endpoint turns telemetry on.
      enabled: data.OTEL_ENABLED || Boolean(data.OTEL_EXPORTER_OTLP_ENDPOINT),
      endpoint: data.OTEL_EXPORTER_OTLP_ENDPOINT ?? null,
      serviceName: data.OTEL_SERVICE_NAME
    }
  };
}
