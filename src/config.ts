import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './core/errors/ResearchErrors.js';
import { LOG_LEVELS, LogLevel } from './utils/logger.js';

// Load environment variables from .env file
dotenv.config();

export const REPORT_PROVIDERS = ['ollama', 'openai', 'groq'] as const;
export type ReportProviderName = (typeof REPORT_PROVIDERS)[number];

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    logLevel: LogLevel;
  };
  search: {
    defaultNumResults: number;
    minNumResults: number;
    maxNumResults: number;
    maxResultsPerBackend: number;
    overfetchFactor: number;
    webTimeoutMs: number;
    academicTimeoutMs: number;
    academicMinIntervalMs: number;
    maxSnippetLength: number;
    userAgent: string;
    webSearchUrl: string;
    academicSearchUrl: string;
    semanticScholarApiKey?: string;
  };
  extraction: {
    timeoutMs: number;
    maxExtractionSize: number; // bytes; larger documents are rejected
    maxContentLength: number; // characters kept per source
    maxParagraphs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterFraction: number;
  };
  jobQueue: {
    maxConcurrentJobs: number;
    perJobConcurrency: number;
  };
  progress: {
    researchStart: number;
    researchComplete: number;
  };
  research: {
    maxRawDataSize: number;
  };
  report: {
    defaultProvider: ReportProviderName;
    defaultModel: string;
    timeoutMs: number;
    ollamaApiUrl?: string;
    openaiApiKey?: string;
    groqApiKey?: string;
  };
  database: {
    enabled: boolean;
    path: string;
  };
  api: {
    enabled: boolean;
    port: number;
  };
}

// Zod validation schema
const ConfigSchema = z
  .object({
    server: z.object({
      name: z.string().min(1, 'Server name must not be empty'),
      version: z.string().min(1, 'Version must not be empty'),
      debug: z.boolean(),
      logLevel: z.enum(LOG_LEVELS),
    }),
    search: z
      .object({
        defaultNumResults: z.number().int().min(1),
        minNumResults: z.number().int().min(1),
        maxNumResults: z.number().int().min(1).max(20),
        maxResultsPerBackend: z.number().int().min(1).max(100),
        overfetchFactor: z.number().int().min(1).max(5),
        webTimeoutMs: z.number().int().min(100).max(120000),
        academicTimeoutMs: z.number().int().min(100).max(120000),
        academicMinIntervalMs: z.number().int().min(0).max(60000),
        maxSnippetLength: z.number().int().min(20).max(2000),
        userAgent: z.string().min(1),
        webSearchUrl: z.string().url('Invalid web search URL'),
        academicSearchUrl: z.string().url('Invalid academic search URL'),
        semanticScholarApiKey: z.string().min(1).optional(),
      })
      .refine((s) => s.minNumResults <= s.maxNumResults, {
        message: 'minNumResults must not exceed maxNumResults',
        path: ['minNumResults'],
      })
      .refine((s) => s.defaultNumResults >= s.minNumResults && s.defaultNumResults <= s.maxNumResults, {
        message: 'defaultNumResults must lie within [minNumResults, maxNumResults]',
        path: ['defaultNumResults'],
      }),
    extraction: z.object({
      timeoutMs: z.number().int().min(100).max(120000),
      maxExtractionSize: z.number().int().min(1024),
      maxContentLength: z.number().int().min(100),
      maxParagraphs: z.number().int().min(1).max(100),
    }),
    retry: z.object({
      maxAttempts: z.number().int().min(1).max(10),
      baseDelayMs: z.number().int().min(0).max(60000),
      maxDelayMs: z.number().int().min(0).max(300000),
      jitterFraction: z.number().min(0).max(1),
    }),
    jobQueue: z.object({
      maxConcurrentJobs: z.number().int().min(1).max(50),
      perJobConcurrency: z.number().int().min(1).max(20),
    }),
    progress: z
      .object({
        researchStart: z.number().int().min(0).max(100),
        researchComplete: z.number().int().min(0).max(100),
      })
      .refine((p) => p.researchStart < p.researchComplete && p.researchComplete < 100, {
        message: 'Progress thresholds must satisfy researchStart < researchComplete < 100',
      }),
    research: z.object({
      maxRawDataSize: z.number().int().min(500),
    }),
    report: z.object({
      defaultProvider: z.enum(REPORT_PROVIDERS),
      defaultModel: z.string().min(1),
      timeoutMs: z.number().int().min(1000),
      ollamaApiUrl: z.string().url('Invalid Ollama URL format').optional(),
      openaiApiKey: z.string().min(1).optional(),
      groqApiKey: z.string().min(1).optional(),
    }),
    database: z.object({
      enabled: z.boolean(),
      path: z.string().min(1),
    }),
    api: z.object({
      enabled: z.boolean(),
      port: z.number().int().min(1024).max(65535),
    }),
  })
  .strict();

/**
 * Parse command line arguments
 * Usage: node dist/index.js --max-concurrent-jobs 4 --ollama-url http://localhost:11434 --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
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

/**
 * Get configuration from CLI arguments, environment variables and defaults, in that order.
 * Throws ConfigurationError listing every invalid setting.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    if (typeof cliArgs[cliKey] === 'string') return String(cliArgs[cliKey]);
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    if (typeof cliArgs[cliKey] === 'string') return String(cliArgs[cliKey]);
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  // NaN survives to the schema, which reports it against the setting's path
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const raw = typeof cliArgs[cliKey] === 'string' ? String(cliArgs[cliKey]) : env[envKey];
    return raw ? Number(raw) : defaultValue;
  };

  const debug = getBoolean('debug', 'DEBUG', false);
  const logLevel = getString('log-level', 'LOG_LEVEL', debug ? 'debug' : 'info').toLowerCase();

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'deep-research'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug,
      logLevel,
    },
    search: {
      defaultNumResults: getNumber('default-num-results', 'DEFAULT_NUM_RESULTS', 2),
      minNumResults: getNumber('min-num-results', 'MIN_NUM_RESULTS', 1),
      maxNumResults: getNumber('max-num-results', 'MAX_NUM_RESULTS', 5),
      maxResultsPerBackend: getNumber('max-results-per-backend', 'MAX_RESULTS_PER_BACKEND', 10),
      overfetchFactor: getNumber('overfetch-factor', 'OVERFETCH_FACTOR', 3),
      webTimeoutMs: getNumber('web-timeout', 'WEB_TIMEOUT_MS', 10000),
      academicTimeoutMs: getNumber('academic-timeout', 'ACADEMIC_TIMEOUT_MS', 5000),
      academicMinIntervalMs: getNumber('academic-min-interval', 'ACADEMIC_MIN_INTERVAL_MS', 2000),
      maxSnippetLength: getNumber('max-snippet-length', 'MAX_SNIPPET_LENGTH', 200),
      userAgent: getString('user-agent', 'USER_AGENT', DEFAULT_USER_AGENT),
      webSearchUrl: getString('web-search-url', 'WEB_SEARCH_URL', 'https://html.duckduckgo.com/html/'),
      academicSearchUrl: getString(
        'academic-search-url',
        'ACADEMIC_SEARCH_URL',
        'https://api.semanticscholar.org/graph/v1/paper/search'
      ),
      semanticScholarApiKey: getOptionalString('semantic-scholar-api-key', 'SEMANTIC_SCHOLAR_API_KEY'),
    },
    extraction: {
      timeoutMs: getNumber('extraction-timeout', 'EXTRACTION_TIMEOUT_MS', 8000),
      maxExtractionSize: getNumber('max-extraction-size', 'MAX_EXTRACTION_SIZE', 1_000_000),
      maxContentLength: getNumber('max-content-length', 'MAX_CONTENT_LENGTH', 2000),
      maxParagraphs: getNumber('max-paragraphs', 'MAX_PARAGRAPHS', 5),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      baseDelayMs: getNumber('retry-base-delay', 'RETRY_BASE_DELAY_MS', 2000),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 10000),
      jitterFraction: getNumber('retry-jitter', 'RETRY_JITTER', 0.2),
    },
    jobQueue: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 2),
      perJobConcurrency: getNumber('per-job-concurrency', 'PER_JOB_CONCURRENCY', 3),
    },
    progress: {
      researchStart: getNumber('progress-research-start', 'PROGRESS_RESEARCH_START', 5),
      researchComplete: getNumber('progress-research-complete', 'PROGRESS_RESEARCH_COMPLETE', 60),
    },
    research: {
      maxRawDataSize: getNumber('max-raw-data-size', 'MAX_RAW_DATA_SIZE', 16000),
    },
    report: {
      defaultProvider: getString('report-provider', 'REPORT_PROVIDER', 'ollama').toLowerCase(),
      defaultModel: getString('report-model', 'REPORT_MODEL', 'llama3.2'),
      timeoutMs: getNumber('report-timeout', 'REPORT_TIMEOUT_MS', 120000),
      ollamaApiUrl: getOptionalString('ollama-url', 'OLLAMA_API_URL'),
      openaiApiKey: getOptionalString('openai-api-key', 'OPENAI_API_KEY'),
      groqApiKey: getOptionalString('groq-api-key', 'GROQ_API_KEY'),
    },
    database: {
      enabled: getBoolean('database', 'DATABASE_ENABLED', true),
      path: getString('database-path', 'DATABASE_PATH', 'data/research.db'),
    },
    api: {
      enabled: getBoolean('api', 'API_ENABLED', true),
      port: getNumber('api-port', 'API_PORT', 3001),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
    throw new ConfigurationError('Configuration validation failed', issues);
  }

  return parsed.data;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║            Deep Research Orchestrator - Configuration            ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(
    `🔎 Search: ${config.search.defaultNumResults} results/backend by default (allowed ${config.search.minNumResults}-${config.search.maxNumResults}) | timeouts web ${config.search.webTimeoutMs}ms, academic ${config.search.academicTimeoutMs}ms`
  );
  console.error(
    `📄 Extraction: ${config.extraction.maxContentLength} chars/source, documents up to ${config.extraction.maxExtractionSize} bytes`
  );
  console.error(
    `⚙️  Queue: ${config.jobQueue.maxConcurrentJobs} concurrent jobs, ${config.jobQueue.perJobConcurrency} extractions/job | Retry: ${config.retry.maxAttempts}x (${config.retry.baseDelayMs}-${config.retry.maxDelayMs}ms, jitter ${config.retry.jitterFraction})`
  );

  const providers = [
    config.report.ollamaApiUrl ? 'ollama' : null,
    config.report.openaiApiKey ? 'openai' : null,
    config.report.groqApiKey ? 'groq' : null,
  ].filter((p): p is string => p !== null);
  console.error(
    `🤖 Reports: ${providers.length > 0 ? providers.join(', ') : 'disabled (no provider configured)'} | default ${config.report.defaultProvider}/${config.report.defaultModel}`
  );

  if (config.database.enabled) {
    console.error(`💾 Database: ${config.database.path}`);
  }
  if (config.api.enabled) {
    console.error(`🌐 REST API: http://localhost:${config.api.port}`);
  }

  console.error('\n' + '─'.repeat(68));
}
