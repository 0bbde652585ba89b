import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError } from '../utils/errors';
import {
  DEFAULT_SERVICES_FILE,
  defaultDataDir,
  expandHome,
  loadConfig,
  loadServiceCatalog,
  parseServiceCatalog,
} from './index';

const HOME = '/home/tester';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({}, HOME);

    expect(config).toEqual({
      dbPath: '/home/tester/.local/share/stack-pulse/state.sqlite',
      outputFile: '/home/tester/.local/share/stack-pulse/ai_metrics.json',
      servicesFile: DEFAULT_SERVICES_FILE,
      minIntervalMs: 10000,
      slowTtlMs: 30000,
      requestTimeoutMs: 1000,
      cycleDeadlineMs: 5000,
      breaker: { failureThreshold: 3, cooldownMs: 60000, restampPolicy: 'sliding' },
      telemetryWindow: 100,
      tokensPerLocalQuery: 500,
      port: 3001,
    });
  });

  it('should read overrides and expand the home directory', () => {
    const config = loadConfig({
      METRICS_DATA_DIR: '~/metrics',
      METRICS_MIN_INTERVAL_MS: ' 2500 ',
      CB_THRESHOLD: '5',
      CB_RESTAMP: 'Fixed',
      PORT: '8088',
    }, HOME);

    expect(config.dbPath).toBe('/home/tester/metrics/state.sqlite');
    expect(config.outputFile).toBe('/home/tester/metrics/ai_metrics.json');
    expect(config.minIntervalMs).toBe(2500);
    expect(config.breaker).toEqual({ failureThreshold: 5, cooldownMs: 60000, restampPolicy: 'fixed' });
    expect(config.port).toBe(8088);
  });

  it('should disable the output file with an empty value', () => {
    expect(loadConfig({ METRICS_OUTPUT_FILE: '' }, HOME).outputFile).toBeNull();
  });

  it.each([
    ['METRICS_SLOW_TTL_MS', 'soon'],
    ['CB_THRESHOLD', '0'],
    ['METRICS_REQUEST_TIMEOUT_MS', '1.5'],
    ['CB_RESTAMP', 'rolling'],
  ])('should reject %s=%s', (name, value) => {
    expect(() => loadConfig({ [name]: value }, HOME)).toThrow(ConfigError);
  });

  it('should name the offending variable', () => {
    try {
      loadConfig({ CB_COOLDOWN_MS: '-1' }, HOME);
      throw new Error('expected a ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.field).toBe('CB_COOLDOWN_MS');
    }
  });
});

describe('expandHome', () => {
  it('should expand only a leading tilde', () => {
    expect(expandHome('~', HOME)).toBe(HOME);
    expect(expandHome('~/logs/a.jsonl', HOME)).toBe('/home/tester/logs/a.jsonl');
    expect(expandHome('/var/~/a', HOME)).toBe('/var/~/a');
  });

  it('should build the default data directory under the home directory', () => {
    expect(defaultDataDir(HOME)).toBe('/home/tester/.local/share/stack-pulse');
  });
});

describe('parseServiceCatalog', () => {
  const vectorStore = {
    id: 'qdrant',
    baseUrl: 'http://localhost:6333/',
    recognizedCollections: { 'codebase-context': 'codebaseContext' },
  };

  it('should fill defaults and normalise paths', () => {
    const catalog = parseServiceCatalog({
      services: [
        { id: 'aidb', port: 8091, healthUrl: 'http://localhost:8091/health', telemetryFile: '~/t/aidb.jsonl' },
      ],
      vectorStore,
    }, HOME);

    expect(catalog.services).toEqual([
      {
        id: 'aidb',
        port: 8091,
        healthUrl: 'http://localhost:8091/health',
        acceptedStatuses: ['ok'],
        telemetryFile: '/home/tester/t/aidb.jsonl',
        modelUrl: null,
        routing: false,
      },
    ]);
    expect(catalog.vectorStore).toEqual({
      id: 'qdrant',
      baseUrl: 'http://localhost:6333',
      recognizedCollections: { 'codebase-context': 'codebaseContext' },
    });
  });

  it('should reject duplicate ids', () => {
    const entry = { id: 'aidb', port: 8091, healthUrl: 'http://localhost:8091/health' };
    expect(() => parseServiceCatalog({ services: [entry, entry], vectorStore }, HOME))
      .toThrow('duplicate service id: aidb');
  });

  it('should reject more than one routing service', () => {
    const services = [
      { id: 'a', port: 1, healthUrl: 'http://localhost:1/health', routing: true },
      { id: 'b', port: 2, healthUrl: 'http://localhost:2/health', routing: true },
    ];
    expect(() => parseServiceCatalog({ services, vectorStore }, HOME))
      .toThrow('at most one service may be marked as routing');
  });

  it('should reject a vector store id shared with a service', () => {
    const services = [{ id: 'qdrant', port: 1, healthUrl: 'http://localhost:1/health' }];
    expect(() => parseServiceCatalog({ services, vectorStore }, HOME))
      .toThrow('vectorStore.id collides with a service id: qdrant');
  });

  it.each([
    [{ id: 'a', port: 70000, healthUrl: 'http://localhost:1/health' }, 'services[0].port'],
    [{ id: 'a', port: 1, healthUrl: 'not a url' }, 'services[0].healthUrl'],
    [{ id: '', port: 1, healthUrl: 'http://localhost:1/health' }, 'services[0].id'],
    [{ id: 'a', port: 1, healthUrl: 'http://localhost:1/health', acceptedStatuses: [] }, 'services[0].acceptedStatuses'],
  ])('should reject %j', (entry, field) => {
    try {
      parseServiceCatalog({ services: [entry], vectorStore }, HOME);
      throw new Error('expected a ConfigError');
    } catch (error) {
      expect(error instanceof ConfigError && error.field).toBe(field);
    }
  });
});

describe('loadServiceCatalog', () => {
  it('should load the bundled catalogue', () => {
    const catalog = loadServiceCatalog(DEFAULT_SERVICES_FILE, HOME);

    expect(catalog.services.map(s => s.id)).toEqual(['aidb', 'hybrid_coordinator', 'llama_cpp', 'embeddings']);
    expect(catalog.services.filter(s => s.routing).map(s => s.id)).toEqual(['hybrid_coordinator']);
    expect(catalog.vectorStore.id).toBe('qdrant');
  });

  it('should wrap unreadable files in a ConfigError', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stack-pulse-cfg-'));
    const file = path.join(dir, 'services.json');
    fs.writeFileSync(file, '{ not json');

    expect(() => loadServiceCatalog(file, HOME)).toThrow(ConfigError);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
