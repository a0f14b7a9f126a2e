import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ServerDefinition } from './core/entities/Server.js';
import { ConfigurationError } from './core/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Config');

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  cluster: {
    serversFile: string;
    servers: ServerDefinition[];
  };
  healthCheck: {
    intervalMs: number;
    probeTimeoutMs: number;
    verifyModel: boolean;
  };
  dispatch: {
    concurrency: number;
    attemptCeiling: number;
    retryDelayMs: number;
  };
  jobs: {
    maxConcurrentJobs: number;
    chunkFailureTolerance: number;
    retentionHours: number;
  };
  results: {
    databasePath: string;
  };
  http: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    enabled: boolean;
  };
}

export const DEFAULT_SERVERS_FILE = {
  servers: [
    {
      name: 'local',
      url: 'http://localhost:11434',
      model: 'gemma3',
      timeout: 30,
      max_retries: 3,
    },
  ],
};

// Servers file entries: timeout in seconds, snake_case retries
const ServerFileEntrySchema = z.object({
  name: z.string().min(1, 'Server name must not be empty'),
  url: z
    .string()
    .url('Invalid server URL format')
    .refine((url) => /^https?:\/\//.test(url), 'Server URL must use http or https'),
  model: z.string().min(1).default('gemma3'),
  timeout: z.number().positive().max(3600).default(30),
  max_retries: z.number().int().min(1).max(10).default(3),
});

export const ServersFileSchema = z
  .object({
    servers: z.array(ServerFileEntrySchema).min(1, 'At least 1 server is required'),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.servers.forEach((server, index) => {
      if (seen.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['servers', index, 'name'],
          message: `Duplicate server name: ${server.name}`,
        });
      }
      seen.add(server.name);
    });
  });

const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  cluster: z.object({
    serversFile: z.string().min(1),
    servers: z.array(
      z.object({
        name: z.string(),
        url: z.string(),
        model: z.string(),
        timeoutMs: z.number(),
        maxRetries: z.number(),
      })
    ),
  }),
  healthCheck: z.object({
    intervalMs: z.number().int().min(1000).max(3600000),
    probeTimeoutMs: z.number().int().min(100).max(60000),
    verifyModel: z.boolean(),
  }),
  dispatch: z.object({
    concurrency: z.number().int().min(1).max(256),
    attemptCeiling: z.number().int().min(1).max(100),
    retryDelayMs: z.number().int().min(0).max(60000),
  }),
  jobs: z.object({
    maxConcurrentJobs: z.number().int().min(1).max(64),
    chunkFailureTolerance: z.number().min(0).max(1),
    retentionHours: z.number().min(0),
  }),
  results: z.object({
    databasePath: z.string().min(1),
  }),
  http: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1024).max(65535),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.errors.map((err) => {
    const issuePath = [prefix, ...err.path].filter((p) => p !== undefined && p !== '').join('.');
    return `${issuePath || 'root'}: ${err.message}`;
  });
}

/**
 * Validate the servers file contents
 */
export function parseServersFile(raw: unknown, source: string = 'servers file'): ServerDefinition[] {
  const parsed = ServersFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}`, formatIssues(parsed.error));
  }

  return parsed.data.servers.map((server) => ({
    name: server.name,
    url: server.url,
    model: server.model,
    timeoutMs: Math.round(server.timeout * 1000),
    maxRetries: server.max_retries,
  }));
}

/**
 * Load the static server list. A missing file is created with a local default;
 * an unreadable or malformed one is fatal.
 */
export function loadServerDefinitions(filePath: string): ServerDefinition[] {
  const resolved = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(resolved)) {
    logger.warn(`Config file ${filePath} not found. Creating default config.`);
    fs.writeFileSync(resolved, JSON.stringify(DEFAULT_SERVERS_FILE, null, 2));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}`, [
      `${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  const servers = parseServersFile(raw, filePath);
  logger.info(`Loaded ${servers.length} Ollama servers from ${filePath}`);
  return servers;
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --servers-file servers.json --concurrency 8 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

export interface ConfigSources {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  // Injected for tests; defaults to reading the servers file
  loadServers?: (filePath: string) => ServerDefinition[];
}

/**
 * Get configuration from CLI arguments, environment variables and the servers file.
 * Throws ConfigurationError listing every invalid setting.
 */
export function getConfig(sources: ConfigSources = {}): Config {
  const argv = sources.argv ?? process.argv;
  if (!sources.env) {
    // Load environment variables from .env file
    dotenv.config();
  }
  const env = sources.env ?? process.env;
  const cliArgs = parseArgs(argv);

  // Helpers: CLI args win over env, env over defaults
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return cli;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return Number(cli);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const serversFile = getString('servers-file', 'OLLAMA_SERVERS_FILE', 'ollama_servers.json');
  const servers = (sources.loadServers ?? loadServerDefinitions)(serversFile);

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'chunk-dispatch'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    cluster: {
      serversFile,
      servers,
    },
    healthCheck: {
      intervalMs: getNumber('health-interval', 'HEALTH_CHECK_INTERVAL_MS', 30000),
      probeTimeoutMs: getNumber('probe-timeout', 'HEALTH_PROBE_TIMEOUT_MS', 5000),
      verifyModel: getBoolean('verify-model', 'HEALTH_VERIFY_MODEL', true),
    },
    dispatch: {
      concurrency: getNumber('concurrency', 'DISPATCH_CONCURRENCY', 4),
      attemptCeiling: getNumber('attempt-ceiling', 'DISPATCH_ATTEMPT_CEILING', 10),
      retryDelayMs: getNumber('retry-delay', 'DISPATCH_RETRY_DELAY_MS', 0),
    },
    jobs: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 2),
      chunkFailureTolerance: getNumber('failure-tolerance', 'CHUNK_FAILURE_TOLERANCE', 0),
      retentionHours: getNumber('retention-hours', 'JOB_RETENTION_HOURS', 24),
    },
    results: {
      databasePath: getString('results-db', 'RESULTS_DB_PATH', 'data/results.db'),
    },
    http: {
      enabled: getBoolean('http', 'HTTP_ENABLED', true),
      port: getNumber('port', 'HTTP_PORT', 3001),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_STDIO_ENABLED', true),
    },
  };

  // Validate configuration
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError('Configuration Validation Failed', formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Print configuration errors with hints
 */
export function printConfigErrors(error: ConfigurationError): void {
  console.error(`\n❌ ${error.message}!\n`);
  console.error('Errors:');
  error.issues.forEach((issue) => console.error(`  • ${issue}`));
  console.error('\n💡 Tips:');
  console.error('  - Check your .env file');
  console.error('  - Verify CLI arguments');
  console.error('  - Check the servers file (name, url, model, timeout in seconds, max_retries)');
  console.error();
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error(`\n📊 Service: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🤖 Servers: ${config.cluster.servers.length} configured (${config.cluster.serversFile})`);
  config.cluster.servers.forEach((server, idx) => {
    console.error(
      `   ${idx + 1}. ${server.name} ${server.url} (${server.model}, timeout ${server.timeoutMs}ms, retries ${server.maxRetries})`
    );
  });
  console.error(
    `\n⚙️  Dispatch: ${config.dispatch.concurrency} workers | attempt ceiling ${config.dispatch.attemptCeiling} | ${config.jobs.maxConcurrentJobs} concurrent jobs`
  );
  console.error(
    `🩺 Health: every ${config.healthCheck.intervalMs}ms (probe timeout ${config.healthCheck.probeTimeoutMs}ms)`
  );
  console.error(`📉 Chunk failure tolerance: ${(config.jobs.chunkFailureTolerance * 100).toFixed(0)}%`);
  if (config.http.enabled) {
    console.error(`🌐 HTTP API: http://localhost:${config.http.port}`);
  }
  console.error(`📡 MCP stdio: ${config.mcp.enabled ? 'enabled' : 'disabled'}`);
  console.error('\n' + '─'.repeat(68));
}
