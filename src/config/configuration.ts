import {
  Confederation,
  DEFAULT_CONFEDERATION_MULTIPLIERS,
  HostNation,
  isConfederation,
} from '../qualification/types/qualification.types';

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Parses `UEFA=1,OFC=0.7` into a full multiplier table.
 * Confederations not named keep their default multiplier.
 */
export function parseConfederationMultipliers(
  raw: string | undefined,
): Record<Confederation, number> {
  const multipliers: Record<Confederation, number> = { ...DEFAULT_CONFEDERATION_MULTIPLIERS };
  if (!raw) return multipliers;

  for (const pair of raw.split(',')) {
    const [name, value] = pair.split('=').map((part) => part.trim());
    const confederation = (name ?? '').toUpperCase();
    const multiplier = Number(value);
    if (isConfederation(confederation) && value !== undefined && Number.isFinite(multiplier)) {
      multipliers[confederation] = multiplier;
    }
  }

  return multipliers;
}

/**
 * Parses `CONCACAF:United States,CONCACAF:Canada` into host nation entries.
 */
export function parseHostNations(raw: string | undefined): HostNation[] {
  if (!raw) return [];

  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .flatMap((entry) => {
      const separator = entry.indexOf(':');
      if (separator === -1) return [];
      const confederation = entry.slice(0, separator).trim().toUpperCase();
      const team = entry.slice(separator + 1).trim();
      return isConfederation(confederation) && team ? [{ confederation, team }] : [];
    });
}

export default () => ({
  port: intFromEnv('PORT', 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  environment: process.env.ENVIRONMENT || process.env.NODE_ENV || 'development',
  database: {
    host: process.env.DATABASE_HOST || 'localhost',
    port: intFromEnv('DATABASE_PORT', 5432),
    username: process.env.DATABASE_USERNAME || 'postgres',
    password: process.env.DATABASE_PASSWORD || 'postgres',
    database: process.env.DATABASE_NAME || 'worldcup_qualifiers',
    poolSize: intFromEnv('DATABASE_POOL_SIZE', 10),
    connectionTimeoutMillis: intFromEnv('DATABASE_TIMEOUT', 5000),
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: intFromEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD,
  },
  rabbitmq: {
    url: process.env.RABBITMQ_URL || 'amqp://localhost:5672',
    queue: process.env.RABBITMQ_QUEUE || 'qualification.run',
    prefetchCount: intFromEnv('RABBITMQ_PREFETCH_COUNT', 1),
    maxRetries: intFromEnv('RABBITMQ_MAX_RETRIES', 3),
  },
  admin: {
    apiKey: process.env.ADMIN_API_KEY,
  },
  metrics: {
    allowedIps: (process.env.METRICS_ALLOWED_IPS || '127.0.0.1,::1,::ffff:127.0.0.1')
      .split(',')
      .map((ip) => ip.trim())
      .filter((ip) => ip.length > 0),
  },
  rateLimit: {
    windowSeconds: intFromEnv('RATE_LIMIT_WINDOW_SECONDS', 60),
    maxRequests: intFromEnv('RATE_LIMIT_MAX_REQUESTS', 20),
  },
  blender: {
    modelVersion: process.env.BLENDER_MODEL_VERSION || 'blend-v1',
    formWeight: floatFromEnv('BLENDER_FORM_WEIGHT', 0.6),
    historicalWeight: floatFromEnv('BLENDER_HISTORICAL_WEIGHT', 0.4),
    formFactorWeights: {
      rank: floatFromEnv('BLENDER_RANK_FACTOR_WEIGHT', 0.5),
      pointsPerGame: floatFromEnv('BLENDER_PPG_FACTOR_WEIGHT', 0.3),
      goalDiff: floatFromEnv('BLENDER_GOAL_DIFF_FACTOR_WEIGHT', 0.2),
    },
    confederationMultipliers: parseConfederationMultipliers(process.env.CONFEDERATION_MULTIPLIERS),
    minProbability: floatFromEnv('BLENDER_MIN_PROBABILITY', 0),
    maxProbability: floatFromEnv('BLENDER_MAX_PROBABILITY', 100),
  },
  qualification: {
    defaultStage: process.env.QUALIFICATION_DEFAULT_STAGE || 'Qualifying Group Stage',
    hostNations: parseHostNations(process.env.HOST_NATIONS),
    dedupEnabled: process.env.RUN_DEDUP_ENABLED !== 'false',
  },
  runs: {
    staleAfterMinutes: intFromEnv('RUN_STALE_AFTER_MINUTES', 30),
    sweepEnabled: process.env.RUN_STALE_SWEEP_ENABLED !== 'false',
  },
  historical: {
    cacheTtlSeconds: intFromEnv('HISTORICAL_LOOKUP_CACHE_TTL', 86400),
    rebuildEnabled: process.env.HISTORICAL_REBUILD_ENABLED !== 'false',
  },
});
