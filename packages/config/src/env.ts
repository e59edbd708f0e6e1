import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const nodeEnvSchema = z.enum(["development", "test", "production"]).default("development");
const deployEnvSchema = z.enum(["development", "staging", "production"]);
const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type NodeEnv = z.infer<typeof nodeEnvSchema>;
export type DeployEnv = z.infer<typeof deployEnvSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;

const topicNameSchema = z.string().regex(/^[A-Za-z][A-Za-z0-9._~+%-]{2,254}$/, {
  message: "Expected a Pub/Sub topic name",
});

const catalogApiConfigInputSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    popularityThreshold: z.number().int().positive().optional(),
    popularityMaxAttempts: z.number().int().positive().optional(),
    popularityRetryDelayMs: z.number().int().nonnegative().optional(),
  })
  .strict()
  .optional();

const cacheConfigInputSchema = z
  .object({
    ownerActivityTtlMs: z.number().int().positive().optional(),
    ownerActivityMaxEntries: z.number().int().positive().optional(),
    entityExistsMaxEntries: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

const pubsubConfigInputSchema = z
  .object({
    projectId: z.string().min(1).optional(),
    entityAuditTopic: topicNameSchema.optional(),
    activityAuditTopic: topicNameSchema.optional(),
    publishTimeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

const acquisitionConfigInputSchema = z
  .object({
    queueName: z.string().regex(/^[a-z][a-z0-9-]*$/).optional(),
    scraperBaseUrl: z.string().url().optional(),
    entityResultTopic: topicNameSchema.optional(),
    activityResultTopic: topicNameSchema.optional(),
  })
  .strict()
  .optional();

const catalogApiConfigSchema = z
  .object({
    baseUrl: z.string().url().default("http://localhost:8999"),
    popularityThreshold: z.number().int().positive().default(5),
    popularityMaxAttempts: z.number().int().positive().default(3),
    popularityRetryDelayMs: z.number().int().nonnegative().default(500),
  })
  .strict()
  .default({});

const cacheConfigSchema = z
  .object({
    ownerActivityTtlMs: z.number().int().positive().default(600_000),
    ownerActivityMaxEntries: z.number().int().positive().default(2000),
    entityExistsMaxEntries: z.number().int().positive().default(10_000),
  })
  .strict()
  .default({});

const pubsubConfigSchema = z
  .object({
    projectId: z.string().min(1).default("pagewise-local"),
    entityAuditTopic: topicNameSchema.default("entities-audit-v1"),
    activityAuditTopic: topicNameSchema.default("activity-audit-v1"),
    publishTimeoutMs: z.number().int().positive().default(60_000),
  })
  .strict()
  .default({});

const acquisitionConfigSchema = z
  .object({
    queueName: z
      .string()
      .regex(/^[a-z][a-z0-9-]*$/)
      .default("acquisition"),
    scraperBaseUrl: z.string().url().default("http://localhost:9080"),
    entityResultTopic: topicNameSchema.default("scraper-entities-v1"),
    activityResultTopic: topicNameSchema.default("scraper-activity-v1"),
  })
  .strict()
  .default({});

const yamlConfigInputSchema = z
  .object({
    logLevel: logLevelSchema.optional(),
    db: z
      .object({
        maxConnections: z.number().int().positive().optional(),
        idleTimeoutMs: z.number().int().nonnegative().optional(),
        connectTimeoutMs: z.number().int().positive().optional(),
        maxLifetimeMs: z.number().int().positive().optional(),
        statementTimeoutMs: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    api: z
      .object({
        host: z.string().optional(),
        port: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    worker: z
      .object({
        dispatchIntervalMs: z.number().int().positive().optional(),
        dispatchBatchSize: z.number().int().positive().optional(),
        maxAttempts: z.number().int().positive().optional(),
        retryBackoffMs: z.number().int().nonnegative().optional(),
        runMigrations: z.boolean().optional(),
        healthPort: z.number().int().positive().nullable().optional(),
      })
      .strict()
      .optional(),
    catalogApi: catalogApiConfigInputSchema,
    cache: cacheConfigInputSchema,
    pubsub: pubsubConfigInputSchema,
    acquisition: acquisitionConfigInputSchema,
  })
  .strict();

const yamlConfigSchema = z
  .object({
    logLevel: logLevelSchema.default("info"),
    db: z
      .object({
        maxConnections: z.number().int().positive().default(10),
        idleTimeoutMs: z.number().int().nonnegative().default(60_000),
        connectTimeoutMs: z.number().int().positive().default(10_000),
        maxLifetimeMs: z.number().int().positive().default(3_600_000),
        statementTimeoutMs: z.number().int().nonnegative().default(30_000),
      })
      .strict()
      .default({}),
    api: z
      .object({
        host: z.string().default("0.0.0.0"),
        port: z.number().int().positive().default(8080),
      })
      .strict()
      .default({}),
    worker: z
      .object({
        dispatchIntervalMs: z.number().int().positive().default(5_000),
        dispatchBatchSize: z.number().int().positive().default(25),
        maxAttempts: z.number().int().positive().default(5),
        retryBackoffMs: z.number().int().nonnegative().default(30_000),
        runMigrations: z.boolean().default(true),
        healthPort: z.number().int().positive().nullable().default(null),
      })
      .strict()
      .default({}),
    catalogApi: catalogApiConfigSchema,
    cache: cacheConfigSchema,
    pubsub: pubsubConfigSchema,
    acquisition: acquisitionConfigSchema,
  })
  .strict();

type YamlConfig = z.infer<typeof yamlConfigSchema>;

export interface DbConfig {
  maxConnections: number;
  idleTimeoutMs: number;
  connectTimeoutMs: number;
  maxLifetimeMs: number;
  statementTimeoutMs: number;
}

export interface CatalogApiConfig {
  baseUrl: string;
  popularityThreshold: number;
  popularityMaxAttempts: number;
  popularityRetryDelayMs: number;
}

export interface CacheConfig {
  ownerActivityTtlMs: number;
  ownerActivityMaxEntries: number;
  entityExistsMaxEntries: number;
}

export interface PubSubConfig {
  projectId: string;
  entityAuditTopic: string;
  activityAuditTopic: string;
  publishTimeoutMs: number;
}

export interface AcquisitionConfig {
  queueName: string;
  scraperBaseUrl: string;
  entityResultTopic: string;
  activityResultTopic: string;
}

export interface DispatchConfig {
  intervalMs: number;
  batchSize: number;
  maxAttempts: number;
  retryBackoffMs: number;
}

export interface BaseEnv {
  NODE_ENV: NodeEnv;
  DEPLOY_ENV: DeployEnv;
  LOG_LEVEL: LogLevel;
  DATABASE_URL: string;
  db: DbConfig;
}

export interface ApiEnv extends BaseEnv {
  HOST: string;
  PORT: number;
  catalogApi: CatalogApiConfig;
  cache: CacheConfig;
  pubsub: PubSubConfig;
  acquisition: AcquisitionConfig;
}

export interface WorkerEnv extends BaseEnv {
  RUN_MIGRATIONS: boolean;
  WORKER_SINGLE_TICK: boolean;
  WORKER_HEALTH_PORT: number | null;
  dispatch: DispatchConfig;
  acquisition: AcquisitionConfig;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveRepoRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

function readYamlObject(filePath: string): Record<string, unknown> {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new Error(`Failed to read config file: ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    throw new Error(`Failed to parse YAML: ${filePath}`, { cause: error });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Expected YAML config to be a mapping/object: ${filePath}`);
  }
  return parsed;
}

function deepMerge(
  baseValue: Record<string, unknown>,
  overrideValue: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...baseValue };
  for (const [key, override] of Object.entries(overrideValue)) {
    const base = merged[key];
    if (isPlainObject(base) && isPlainObject(override)) {
      merged[key] = deepMerge(base, override);
      continue;
    }
    merged[key] = override;
  }
  return merged;
}

function loadYamlConfig(params: { deployEnv: DeployEnv; nodeEnv: NodeEnv }): YamlConfig {
  const repoRoot = resolveRepoRoot();
  const basePath = path.join(repoRoot, "config", "base.yaml");
  const envPath = path.join(repoRoot, "config", "env", `${params.deployEnv}.yaml`);

  const baseRaw = yamlConfigInputSchema.parse(readYamlObject(basePath));
  const envRaw =
    params.nodeEnv === "test" ? {} : yamlConfigInputSchema.parse(readYamlObject(envPath));
  return yamlConfigSchema.parse(deepMerge(baseRaw, envRaw));
}

function resolveDeployEnv(params: {
  nodeEnv: NodeEnv;
  deployEnv: DeployEnv | undefined;
}): DeployEnv {
  if (params.deployEnv) return params.deployEnv;
  return params.nodeEnv === "production" ? "production" : "development";
}

const baseEnvSchema = z.object({
  NODE_ENV: nodeEnvSchema,
  DEPLOY_ENV: deployEnvSchema.optional(),
  DATABASE_URL: z.string().min(1),
});

const baseOverridesEnvSchema = z.object({ LOG_LEVEL: logLevelSchema.optional() });
const dbOverridesEnvSchema = z
  .object({
    DB_MAX_CONNECTIONS: z.coerce.number().int().positive().optional(),
    DB_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
    DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    DB_MAX_LIFETIME_MS: z.coerce.number().int().positive().optional(),
    DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  })
  .strip();

const catalogApiOverridesEnvSchema = z
  .object({
    CATALOG_API_BASE_URL: z.string().url().optional(),
    POPULARITY_THRESHOLD: z.coerce.number().int().positive().optional(),
    POPULARITY_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
    POPULARITY_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  })
  .strip();

const cacheOverridesEnvSchema = z
  .object({
    OWNER_ACTIVITY_CACHE_TTL_MS: z.coerce.number().int().positive().optional(),
    OWNER_ACTIVITY_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
    ENTITY_EXISTS_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  })
  .strip();

const pubsubOverridesEnvSchema = z
  .object({
    PUBSUB_PROJECT_ID: z.string().min(1).optional(),
    PUBSUB_ENTITY_AUDIT_TOPIC: topicNameSchema.optional(),
    PUBSUB_ACTIVITY_AUDIT_TOPIC: topicNameSchema.optional(),
    PUBSUB_PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  })
  .strip();

const acquisitionOverridesEnvSchema = z
  .object({
    ACQUISITION_QUEUE_NAME: z
      .string()
      .regex(/^[a-z][a-z0-9-]*$/)
      .optional(),
    SCRAPER_BASE_URL: z.string().url().optional(),
    SCRAPER_ENTITY_RESULT_TOPIC: topicNameSchema.optional(),
    SCRAPER_ACTIVITY_RESULT_TOPIC: topicNameSchema.optional(),
  })
  .strip();

type ParsedBaseEnv = z.infer<typeof baseEnvSchema>;
type ResolvedBaseEnv = Omit<ParsedBaseEnv, "DEPLOY_ENV"> & { DEPLOY_ENV: DeployEnv };

function loadBaseParts(env: NodeJS.ProcessEnv): { base: ResolvedBaseEnv; yaml: YamlConfig } {
  const base = baseEnvSchema.parse(env);
  const deployEnv = resolveDeployEnv({ nodeEnv: base.NODE_ENV, deployEnv: base.DEPLOY_ENV });
  const yaml = loadYamlConfig({ deployEnv, nodeEnv: base.NODE_ENV });
  return { base: { ...base, DEPLOY_ENV: deployEnv }, yaml };
}

function resolveBaseEnv(base: ResolvedBaseEnv, yaml: YamlConfig, env: NodeJS.ProcessEnv): BaseEnv {
  const overrides = baseOverridesEnvSchema.parse(env);
  return {
    NODE_ENV: base.NODE_ENV,
    DEPLOY_ENV: base.DEPLOY_ENV,
    DATABASE_URL: base.DATABASE_URL,
    LOG_LEVEL: overrides.LOG_LEVEL ?? yaml.logLevel,
    db: resolveDbConfig(yaml, env),
  };
}

function resolveDbConfig(yaml: YamlConfig, env: NodeJS.ProcessEnv): DbConfig {
  const overrides = dbOverridesEnvSchema.parse(env);
  return {
    maxConnections: overrides.DB_MAX_CONNECTIONS ?? yaml.db.maxConnections,
    idleTimeoutMs: overrides.DB_IDLE_TIMEOUT_MS ?? yaml.db.idleTimeoutMs,
    connectTimeoutMs: overrides.DB_CONNECT_TIMEOUT_MS ?? yaml.db.connectTimeoutMs,
    maxLifetimeMs: overrides.DB_MAX_LIFETIME_MS ?? yaml.db.maxLifetimeMs,
    statementTimeoutMs: overrides.DB_STATEMENT_TIMEOUT_MS ?? yaml.db.statementTimeoutMs,
  };
}

function resolveCatalogApiConfig(yaml: YamlConfig, env: NodeJS.ProcessEnv): CatalogApiConfig {
  const overrides = catalogApiOverridesEnvSchema.parse(env);
  return {
    baseUrl: overrides.CATALOG_API_BASE_URL ?? yaml.catalogApi.baseUrl,
    popularityThreshold: overrides.POPULARITY_THRESHOLD ?? yaml.catalogApi.popularityThreshold,
    popularityMaxAttempts:
      overrides.POPULARITY_MAX_ATTEMPTS ?? yaml.catalogApi.popularityMaxAttempts,
    popularityRetryDelayMs:
      overrides.POPULARITY_RETRY_DELAY_MS ?? yaml.catalogApi.popularityRetryDelayMs,
  };
}

function resolveCacheConfig(yaml: YamlConfig, env: NodeJS.ProcessEnv): CacheConfig {
  const overrides = cacheOverridesEnvSchema.parse(env);
  return {
    ownerActivityTtlMs: overrides.OWNER_ACTIVITY_CACHE_TTL_MS ?? yaml.cache.ownerActivityTtlMs,
    ownerActivityMaxEntries:
      overrides.OWNER_ACTIVITY_CACHE_MAX_ENTRIES ?? yaml.cache.ownerActivityMaxEntries,
    entityExistsMaxEntries:
      overrides.ENTITY_EXISTS_CACHE_MAX_ENTRIES ?? yaml.cache.entityExistsMaxEntries,
  };
}

function resolvePubSubConfig(yaml: YamlConfig, env: NodeJS.ProcessEnv): PubSubConfig {
  const overrides = pubsubOverridesEnvSchema.parse(env);
  return {
    projectId: overrides.PUBSUB_PROJECT_ID ?? yaml.pubsub.projectId,
    entityAuditTopic: overrides.PUBSUB_ENTITY_AUDIT_TOPIC ?? yaml.pubsub.entityAuditTopic,
    activityAuditTopic: overrides.PUBSUB_ACTIVITY_AUDIT_TOPIC ?? yaml.pubsub.activityAuditTopic,
    publishTimeoutMs: overrides.PUBSUB_PUBLISH_TIMEOUT_MS ?? yaml.pubsub.publishTimeoutMs,
  };
}

function resolveAcquisitionConfig(yaml: YamlConfig, env: NodeJS.ProcessEnv): AcquisitionConfig {
  const overrides = acquisitionOverridesEnvSchema.parse(env);
  return {
    queueName: overrides.ACQUISITION_QUEUE_NAME ?? yaml.acquisition.queueName,
    scraperBaseUrl: overrides.SCRAPER_BASE_URL ?? yaml.acquisition.scraperBaseUrl,
    entityResultTopic:
      overrides.SCRAPER_ENTITY_RESULT_TOPIC ?? yaml.acquisition.entityResultTopic,
    activityResultTopic:
      overrides.SCRAPER_ACTIVITY_RESULT_TOPIC ?? yaml.acquisition.activityResultTopic,
  };
}

export function loadBaseEnv(env: NodeJS.ProcessEnv = process.env): BaseEnv {
  const { base, yaml } = loadBaseParts(env);
  return resolveBaseEnv(base, yaml, env);
}

const apiOverridesEnvSchema = z
  .object({
    HOST: z.string().min(1).optional(),
    PORT: z.coerce.number().int().positive().optional(),
  })
  .strip();

export function loadApiEnv(env: NodeJS.ProcessEnv = process.env): ApiEnv {
  const { base, yaml } = loadBaseParts(env);
  const overrides = apiOverridesEnvSchema.parse(env);

  return {
    ...resolveBaseEnv(base, yaml, env),
    HOST: overrides.HOST ?? yaml.api.host,
    PORT: overrides.PORT ?? yaml.api.port,
    catalogApi: resolveCatalogApiConfig(yaml, env),
    cache: resolveCacheConfig(yaml, env),
    pubsub: resolvePubSubConfig(yaml, env),
    acquisition: resolveAcquisitionConfig(yaml, env),
  };
}

const optionalBooleanFromString = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? undefined : value.trim().toLowerCase()))
  .refine(
    (value) =>
      value === undefined ||
      value === "true" ||
      value === "false" ||
      value === "1" ||
      value === "0",
    { message: "Expected a boolean string (true/false/1/0)" },
  )
  .transform((value) => (value === undefined ? undefined : value === "true" || value === "1"));

const workerOverridesEnvSchema = z
  .object({
    DISPATCH_INTERVAL_MS: z.coerce.number().int().positive().optional(),
    DISPATCH_BATCH_SIZE: z.coerce.number().int().positive().optional(),
    DISPATCH_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
    DISPATCH_RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().optional(),
    RUN_MIGRATIONS: optionalBooleanFromString,
    WORKER_SINGLE_TICK: optionalBooleanFromString,
    WORKER_HEALTH_PORT: z.coerce.number().int().positive().optional(),
  })
  .strip();

export function loadWorkerEnv(env: NodeJS.ProcessEnv = process.env): WorkerEnv {
  const { base, yaml } = loadBaseParts(env);
  const overrides = workerOverridesEnvSchema.parse(env);

  return {
    ...resolveBaseEnv(base, yaml, env),
    RUN_MIGRATIONS: overrides.RUN_MIGRATIONS ?? yaml.worker.runMigrations,
    WORKER_SINGLE_TICK: overrides.WORKER_SINGLE_TICK ?? false,
    WORKER_HEALTH_PORT: overrides.WORKER_HEALTH_PORT ?? yaml.worker.healthPort,
    dispatch: {
      intervalMs: overrides.DISPATCH_INTERVAL_MS ?? yaml.worker.dispatchIntervalMs,
      batchSize: overrides.DISPATCH_BATCH_SIZE ?? yaml.worker.dispatchBatchSize,
      maxAttempts: overrides.DISPATCH_MAX_ATTEMPTS ?? yaml.worker.maxAttempts,
      retryBackoffMs: overrides.DISPATCH_RETRY_BACKOFF_MS ?? yaml.worker.retryBackoffMs,
    },
    acquisition: resolveAcquisitionConfig(yaml, env),
  };
}
