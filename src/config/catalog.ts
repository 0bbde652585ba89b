import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError } from '../utils/errors';
import { isJsonObject, readArray, readCount, readObject, readString } from '../utils/option';

/** One cheap upstream: a health endpoint plus an optional local telemetry log. */
export interface ServiceDefinition {
  id: string;
  port: number;
  healthUrl: string;
  /** `status` values that count as healthy, e.g. ["ok"] or ["healthy", "ok"] */
  acceptedStatuses: string[];
  telemetryFile: string | null;
  /** OpenAI-style models listing; its first `data[].id` becomes the record's model */
  modelUrl: string | null;
  /** The routing service feeds usage and efficiency into the effectiveness score */
  routing: boolean;
}

/** The directory-style upstream the slow path enumerates. */
export interface VectorStoreDefinition {
  id: string;
  baseUrl: string;
  /** collection name -> breakdown field name */
  recognizedCollections: Record<string, string>;
}

export interface ServiceCatalog {
  services: ServiceDefinition[];
  vectorStore: VectorStoreDefinition;
}

export const DEFAULT_SERVICES_FILE = path.resolve(__dirname, '..', '..', 'config', 'services.json');

export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === '~') return homeDir;
  if (filePath.startsWith('~/')) return path.join(homeDir, filePath.slice(2));
  return filePath;
}

function requireString(source: unknown, key: string, field: string): string {
  const value = readString(source, key);
  if (!value.some || value.value.trim() === '') {
    throw new ConfigError(`${field}.${key} must be a non-empty string`, `${field}.${key}`);
  }
  return value.value;
}

function requirePort(source: unknown, field: string): number {
  const port = readCount(source, 'port');
  if (!port.some || port.value < 1 || port.value > 65535) {
    throw new ConfigError(`${field}.port must be an integer between 1 and 65535`, `${field}.port`);
  }
  return port.value;
}

function requireUrl(source: unknown, key: string, field: string): string {
  const value = requireString(source, key, field);
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`${field}.${key} is not a valid URL: ${value}`, `${field}.${key}`);
  }
  return value;
}

function optionalUrl(source: unknown, key: string, field: string): string | null {
  if (!isJsonObject(source) || source[key] === undefined || source[key] === null) return null;
  return requireUrl(source, key, field);
}

function parseServiceDefinition(raw: unknown, index: number, homeDir: string): ServiceDefinition {
  const field = `services[${index}]`;
  if (!isJsonObject(raw)) {
    throw new ConfigError(`${field} must be an object`, field);
  }

  const statuses = readArray(raw, 'acceptedStatuses');
  const acceptedStatuses = statuses.some
    ? statuses.value.filter((s): s is string => typeof s === 'string' && s !== '')
    : ['ok'];
  if (acceptedStatuses.length === 0) {
    throw new ConfigError(`${field}.acceptedStatuses must list at least one status`, `${field}.acceptedStatuses`);
  }

  const telemetry = readString(raw, 'telemetryFile');

  return {
    id: requireString(raw, 'id', field),
    port: requirePort(raw, field),
    healthUrl: requireUrl(raw, 'healthUrl', field),
    acceptedStatuses,
    telemetryFile: telemetry.some && telemetry.value !== '' ? expandHome(telemetry.value, homeDir) : null,
    modelUrl: optionalUrl(raw, 'modelUrl', field),
    routing: raw.routing === true,
  };
}

function parseVectorStore(raw: unknown): VectorStoreDefinition {
  const field = 'vectorStore';
  if (!isJsonObject(raw)) {
    throw new ConfigError('vectorStore must be an object', field);
  }

  const recognized: Record<string, string> = {};
  const names = readObject(raw, 'recognizedCollections');
  if (names.some) {
    for (const [collection, breakdownField] of Object.entries(names.value)) {
      if (typeof breakdownField !== 'string' || breakdownField === '') {
        throw new ConfigError(
          `vectorStore.recognizedCollections.${collection} must name a breakdown field`,
          `vectorStore.recognizedCollections.${collection}`
        );
      }
      recognized[collection] = breakdownField;
    }
  }

  return {
    id: requireString(raw, 'id', field),
    baseUrl: requireUrl(raw, 'baseUrl', field).replace(/\/+$/, ''),
    recognizedCollections: recognized,
  };
}

/**
 * Validate a parsed services.json document.
 */
export function parseServiceCatalog(raw: unknown, homeDir: string = os.homedir()): ServiceCatalog {
  const services = readArray(raw, 'services');
  if (!services.some) {
    throw new ConfigError('services must be an array', 'services');
  }

  const definitions = services.value.map((entry, index) => parseServiceDefinition(entry, index, homeDir));

  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.id)) {
      throw new ConfigError(`duplicate service id: ${definition.id}`, 'services');
    }
    seen.add(definition.id);
  }

  if (definitions.filter(d => d.routing).length > 1) {
    throw new ConfigError('at most one service may be marked as routing', 'services');
  }

  const vectorStore = parseVectorStore(isJsonObject(raw) ? raw.vectorStore : undefined);
  if (seen.has(vectorStore.id)) {
    throw new ConfigError(`vectorStore.id collides with a service id: ${vectorStore.id}`, 'vectorStore.id');
  }

  return { services: definitions, vectorStore };
}

export function loadServiceCatalog(filePath: string, homeDir: string = os.homedir()): ServiceCatalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`cannot read service catalogue ${filePath}: ${reason}`, 'METRICS_SERVICES_FILE');
  }
  return parseServiceCatalog(parsed, homeDir);
}
