/**
 * Relay Configuration
 *
 * Derived from environment variables (a .env file is loaded by the entry
 * points). CLI flags override individual values through withOverrides().
 */

import * as path from 'path';
import { z } from 'zod';
import { RelayError } from '../errors.js';
import { DEFAULT_LEDGER_FILENAME } from '../ledger/DedupLedger.js';

const SourceKindSchema = z.enum(['dicomweb', 'orthanc', 'dimse']);
const RetrieveModeSchema = z.enum(['wado', 'move']);
const DestinationKindSchema = z.enum(['dicomweb', 'dimse', 'folder']);

export type SourceKind = z.infer<typeof SourceKindSchema>;
export type RetrieveMode = z.infer<typeof RetrieveModeSchema>;
export type DestinationKind = z.infer<typeof DestinationKindSchema>;

export interface EndpointConfig {
  /** Base URL for DICOMweb / Orthanc REST endpoints */
  url?: string;
  /** DIMSE host, port and AE title */
  host: string;
  port: number;
  aeTitle: string;
}

export interface RelayConfig {
  source: EndpointConfig & { kind: SourceKind };
  /** RELAY_RETRIEVE, default wado for DICOMweb sources and move otherwise */
  retrieve: RetrieveMode;
  destination: EndpointConfig & { kind: DestinationKind };
  /** Our AE title (RELAY_LOCAL_AET, default DICOM_RELAY) */
  localAeTitle: string;
  /** Storage listener port (RELAY_LISTEN_PORT, default 11112) */
  listenPort: number;
  /** Root of received/written objects (RELAY_OUTPUT_DIR, default ./received) */
  outputDir: string;
  /** RELAY_LEDGER_PATH, default <outputDir>/.processed_studies.json */
  ledgerPath: string;
  /** RELAY_POLL_INTERVAL_MS, default 5000 */
  pollIntervalMs: number;
  /** RELAY_RETRY_BACKOFF_MAX_MS, default 0 (retry on every poll) */
  retryBackoffMaxMs: number;
  /** RELAY_MOVE_QUIESCENCE_MS, default 5000 */
  moveQuiescenceMs: number;
  /** RELAY_MOVE_TIMEOUT_MS, default 300000 */
  moveTimeoutMs: number;
  /** RELAY_HTTP_TIMEOUT_MS, default 60000 */
  httpTimeoutMs: number;
}

let cachedConfig: RelayConfig | null = null;

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseChoice<S extends z.ZodEnum<[string, ...string[]]>>(
  schema: S,
  name: string,
  value: string | undefined,
  defaultValue: z.infer<S>
): z.infer<S> {
  if (value === undefined || value === '') return defaultValue;
  const parsed = schema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new RelayError(`${name} must be one of ${schema.options.join(', ')} (got "${value}")`);
  }
  return parsed.data;
}

/**
 * Build the configuration from an environment map
 */
export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const sourceKind = parseChoice(SourceKindSchema, 'RELAY_SOURCE_KIND', env['RELAY_SOURCE_KIND'], 'dicomweb');
  const outputDir = env['RELAY_OUTPUT_DIR'] || './received';

  return {
    source: {
      kind: sourceKind,
      url: env['RELAY_SOURCE_URL'] || undefined,
      host: env['RELAY_SOURCE_HOST'] || 'localhost',
      port: parseNumber(env['RELAY_SOURCE_PORT'], 4242),
      aeTitle: env['RELAY_SOURCE_AET'] || 'ORTHANC',
    },
    retrieve: parseChoice(
      RetrieveModeSchema,
      'RELAY_RETRIEVE',
      env['RELAY_RETRIEVE'],
      sourceKind === 'dicomweb' ? 'wado' : 'move'
    ),
    destination: {
      kind: parseChoice(DestinationKindSchema, 'RELAY_DEST_KIND', env['RELAY_DEST_KIND'], 'folder'),
      url: env['RELAY_DEST_URL'] || undefined,
      host: env['RELAY_DEST_HOST'] || 'localhost',
      port: parseNumber(env['RELAY_DEST_PORT'], 104),
      aeTitle: env['RELAY_DEST_AET'] || 'STORESCP',
    },
    localAeTitle: env['RELAY_LOCAL_AET'] || 'DICOM_RELAY',
    listenPort: parseNumber(env['RELAY_LISTEN_PORT'], 11112),
    outputDir,
    ledgerPath: env['RELAY_LEDGER_PATH'] || path.join(outputDir, DEFAULT_LEDGER_FILENAME),
    pollIntervalMs: parseNumber(env['RELAY_POLL_INTERVAL_MS'], 5000),
    retryBackoffMaxMs: parseNumber(env['RELAY_RETRY_BACKOFF_MAX_MS'], 0),
    moveQuiescenceMs: parseNumber(env['RELAY_MOVE_QUIESCENCE_MS'], 5000),
    moveTimeoutMs: parseNumber(env['RELAY_MOVE_TIMEOUT_MS'], 300000),
    httpTimeoutMs: parseNumber(env['RELAY_HTTP_TIMEOUT_MS'], 60000),
  };
}

/**
 * Cached configuration from process.env; use resetRelayConfig() in tests
 */
export function getRelayConfig(): RelayConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = loadRelayConfig();
  return cachedConfig;
}

export function resetRelayConfig(): void {
  cachedConfig = null;
}

export interface ConfigOverrides {
  outputDir?: string;
  ledgerPath?: string;
  pollIntervalMs?: number;
  listenPort?: number;
  localAeTitle?: string;
}

/**
 * Apply CLI overrides. A new output directory moves the default ledger
 * along with it unless a ledger path is given too.
 */
export function withOverrides(config: RelayConfig, overrides: ConfigOverrides): RelayConfig {
  const outputDir = overrides.outputDir ?? config.outputDir;
  const ledgerFollowsOutput =
    overrides.outputDir !== undefined &&
    config.ledgerPath === path.join(config.outputDir, DEFAULT_LEDGER_FILENAME);

  return {
    ...config,
    outputDir,
    ledgerPath:
      overrides.ledgerPath ??
      (ledgerFollowsOutput ? path.join(outputDir, DEFAULT_LEDGER_FILENAME) : config.ledgerPath),
    pollIntervalMs: overrides.pollIntervalMs ?? config.pollIntervalMs,
    listenPort: overrides.listenPort ?? config.listenPort,
    localAeTitle: overrides.localAeTitle ?? config.localAeTitle,
  };
}

function validPort(port: number, allowZero = false): boolean {
  return Number.isInteger(port) && port >= (allowZero ? 0 : 1) && port <= 65535;
}

/**
 * Problems that make the configuration unusable; empty when it is fine
 */
export function validateRelayConfig(config: RelayConfig): string[] {
  const problems: string[] = [];
  const { source, destination } = config;

  if ((source.kind === 'dicomweb' || source.kind === 'orthanc') && !source.url) {
    problems.push(`RELAY_SOURCE_URL is required for a ${source.kind} source`);
  }
  if (config.retrieve === 'wado' && source.kind !== 'dicomweb') {
    problems.push('RELAY_RETRIEVE=wado needs a dicomweb source');
  }
  if ((config.retrieve === 'move' || source.kind === 'dimse') && !validPort(source.port)) {
    problems.push(`RELAY_SOURCE_PORT ${source.port} is not a valid port`);
  }
  if (destination.kind === 'dicomweb' && !destination.url) {
    problems.push('RELAY_DEST_URL is required for a dicomweb destination');
  }
  if (destination.kind === 'dimse' && !validPort(destination.port)) {
    problems.push(`RELAY_DEST_PORT ${destination.port} is not a valid port`);
  }
  if (config.retrieve === 'move' && !validPort(config.listenPort, true)) {
    problems.push(`RELAY_LISTEN_PORT ${config.listenPort} is not a valid port`);
  }
  if (config.localAeTitle.length === 0 || config.localAeTitle.length > 16) {
    problems.push('RELAY_LOCAL_AET must be 1 to 16 characters');
  }
  if (config.pollIntervalMs <= 0) {
    problems.push('RELAY_POLL_INTERVAL_MS must be positive');
  }
  if (config.retryBackoffMaxMs < 0) {
    problems.push('RELAY_RETRY_BACKOFF_MAX_MS must not be negative');
  }
  if (config.moveQuiescenceMs <= 0 || config.moveTimeoutMs <= 0) {
    problems.push('RELAY_MOVE_QUIESCENCE_MS and RELAY_MOVE_TIMEOUT_MS must be positive');
  }
  return problems;
}
