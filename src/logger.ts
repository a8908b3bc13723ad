import pino from 'pino';

export type LogTier = 'minimal' | 'debug' | 'verbose';

/**
 * What each tier shows, by pino level:
 *
 * - minimal → warn: startup aborts, plugins that fail to start, malformed
 *   scheduled actions dropped from a config, topic queries that time out,
 *   failed mode reversals, bus handler errors.
 * - debug → info (default): plugin load/unload/reload, external config
 *   edits, every scheduled mode change set, fired, invalidated or resynced.
 * - verbose → debug: each request routed on the bus, middleware swallows,
 *   every topic observed, config saves the watcher ignores.
 */
const TIER_LEVELS: Record<LogTier, pino.Level> = {
  minimal: 'warn',
  debug: 'info',
  verbose: 'debug',
};

function isLogTier(value: string | undefined): value is LogTier {
  return value === 'minimal' || value === 'debug' || value === 'verbose';
}

// OPSBOT_LOG_LEVEL, OPSBOT_VERBOSE=true or --verbose set the tier before
// config.toml is read, and keep it afterwards.
function envLogTier(): LogTier | undefined {
  const explicit = process.env.OPSBOT_LOG_LEVEL?.toLowerCase();
  if (isLogTier(explicit)) return explicit;
  if (process.env.OPSBOT_VERBOSE === 'true' || process.argv.includes('--verbose')) return 'verbose';
  return undefined;
}

const envTier = envLogTier();

export let logTier: LogTier = envTier ?? 'debug';

export const logger = pino({ level: TIER_LEVELS[logTier] }, pino.destination({ sync: true }));

export type { Logger } from 'pino';

/** Apply `[logging] level` from config.toml unless the environment chose a tier. */
export function applyConfigLogLevel(configLevel: LogTier): void {
  if (envTier !== undefined || configLevel === logTier) return;
  logTier = configLevel;
  logger.level = TIER_LEVELS[configLevel];
}
