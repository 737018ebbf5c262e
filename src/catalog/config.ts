import path from 'path';
import { ConfigError } from './errors.js';
import { SIZE_TAGS, isSizeTag } from './types.js';
import type { SyncConfig } from './types.js';

type IntegerKey =
  | 'preferredSize'
  | 'concurrency'
  | 'pageSize'
  | 'requestTimeoutMs'
  | 'downloadTimeoutMs'
  | 'maxPageAttempts'
  | 'pageRetryDelayMs'
  | 'maxPages'
  | 'downloadAttempts'
  | 'progressEvery';

type StringKey = 'apiBaseUrl' | 'imageBaseUrl' | 'outputDir';

type BooleanKey = 'onlyWithImages' | 'skipExisting' | 'insecureTls' | 'verbose';

interface IntegerOption {
  key: IntegerKey;
  env: string;
  flag: string;
  fallback?: number;
  min: number;
}

const INTEGER_OPTIONS: IntegerOption[] = [
  { key: 'preferredSize', env: 'IMAGES_PREFERRED_SIZE', flag: '--size', fallback: 250, min: 1 },
  { key: 'concurrency', env: 'IMAGES_CONCURRENCY', flag: '--concurrency', fallback: 8, min: 1 },
  { key: 'pageSize', env: 'CATALOG_PAGE_SIZE', flag: '--page-size', min: 1 },
  { key: 'requestTimeoutMs', env: 'CATALOG_TIMEOUT_MS', flag: '--timeout', fallback: 30000, min: 1 },
  { key: 'downloadTimeoutMs', env: 'IMAGES_TIMEOUT_MS', flag: '--download-timeout', fallback: 20000, min: 1 },
  { key: 'maxPageAttempts', env: 'CATALOG_PAGE_ATTEMPTS', flag: '--page-attempts', fallback: 3, min: 1 },
  { key: 'pageRetryDelayMs', env: 'CATALOG_RETRY_DELAY_MS', flag: '--retry-delay', fallback: 1000, min: 0 },
  { key: 'maxPages', env: 'CATALOG_MAX_PAGES', flag: '--max-pages', fallback: 1000, min: 1 },
  { key: 'downloadAttempts', env: 'IMAGES_DOWNLOAD_ATTEMPTS', flag: '--download-attempts', fallback: 1, min: 1 },
  { key: 'progressEvery', env: 'IMAGES_PROGRESS_EVERY', flag: '--progress-every', fallback: 25, min: 0 }
];

const STRING_FLAGS: Record<string, StringKey> = {
  '--api': 'apiBaseUrl',
  '--image-base': 'imageBaseUrl',
  '--out': 'outputDir'
};

const BOOLEAN_FLAGS: Record<string, { key: BooleanKey; value: boolean }> = {
  '--all-products': { key: 'onlyWithImages', value: false },
  '--skip-existing': { key: 'skipExisting', value: true },
  '--insecure': { key: 'insecureTls', value: true },
  '--verbose': { key: 'verbose', value: true }
};

export interface CliOverrides {
  strings: Partial<Record<StringKey, string>>;
  integers: Partial<Record<IntegerKey, string>>;
  booleans: Partial<Record<BooleanKey, boolean>>;
  help: boolean;
}

export const USAGE = [
  'Usage: product-images [options]',
  '',
  '  --api <url>                catalog API base URL (API_BASE_URL)',
  '  --image-base <url>         base for relative image URLs (IMAGE_BASE_URL)',
  '  --out <dir>                output directory (IMAGES_OUTPUT_DIR)',
  ...INTEGER_OPTIONS.map(option => `  ${`${option.flag} <n>`.padEnd(27)}(${option.env}, default ${option.fallback ?? 'unset'})`),
  '  --all-products             do not filter the catalog to products with images',
  '  --skip-existing            keep images already on disk',
  '  --insecure                 skip TLS certificate verification',
  '  --verbose                  log every page and download',
  '  --help                     show this message'
].join('\n');

export function parseArgs(argv: readonly string[]): CliOverrides {
  const overrides: CliOverrides = { strings: {}, integers: {}, booleans: {}, help: false };
  const problems: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    const booleanFlag = BOOLEAN_FLAGS[arg];
    const stringKey = STRING_FLAGS[arg];
    const integerOption = INTEGER_OPTIONS.find(option => option.flag === arg);

    if (arg === '--help' || arg === '-h') {
      overrides.help = true;
    } else if (booleanFlag) {
      overrides.booleans[booleanFlag.key] = booleanFlag.value;
    } else if ((stringKey || integerOption) && next === undefined) {
      problems.push(`${arg} expects a value`);
    } else if (stringKey) {
      overrides.strings[stringKey] = next;
      i += 1;
    } else if (integerOption) {
      overrides.integers[integerOption.key] = next;
      i += 1;
    } else {
      problems.push(`unknown argument "${arg}"`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return overrides;
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseBoolean(raw: string | undefined, fallback: boolean, name: string, problems: string[]): boolean {
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  problems.push(`${name} must be true or false (got "${raw}")`);
  return fallback;
}

function parseUrl(raw: string | undefined, name: string, problems: string[]): string | undefined {
  if (raw === undefined) {
    return undefined;
  }
  try {
    return new URL(raw).toString();
  } catch {
    problems.push(`${name} is not a valid URL (got "${raw}")`);
    return undefined;
  }
}

/**
 * Environment defaults overlaid with command line flags. Every invalid value
 * is reported at once through a ConfigError.
 */
export function buildConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): Readonly<SyncConfig> {
  const overrides = parseArgs(argv);
  const problems: string[] = [];

  const integers: Partial<Record<IntegerKey, number>> = {};
  for (const option of INTEGER_OPTIONS) {
    const raw = overrides.integers[option.key] ?? readEnv(env, option.env);
    if (raw === undefined) {
      integers[option.key] = option.fallback;
      continue;
    }
    const value = Number(raw.trim());
    if (!Number.isInteger(value) || value < option.min) {
      problems.push(`${option.flag} / ${option.env} must be an integer >= ${option.min} (got "${raw}")`);
      integers[option.key] = option.fallback;
    } else {
      integers[option.key] = value;
    }
  }

  const preferredSize = integers.preferredSize ?? 250;
  if (!isSizeTag(preferredSize)) {
    problems.push(`preferred size must be one of ${SIZE_TAGS.join(', ')} (got ${preferredSize})`);
  }

  const apiBaseUrl = parseUrl(overrides.strings.apiBaseUrl ?? readEnv(env, 'API_BASE_URL'), 'API_BASE_URL', problems);
  if (apiBaseUrl === undefined && !problems.some(problem => problem.startsWith('API_BASE_URL'))) {
    problems.push('API_BASE_URL is required (set it in the environment, .env or with --api)');
  }
  const imageBaseUrl =
    parseUrl(overrides.strings.imageBaseUrl ?? readEnv(env, 'IMAGE_BASE_URL'), 'IMAGE_BASE_URL', problems) ?? apiBaseUrl;

  const booleans = {
    onlyWithImages:
      overrides.booleans.onlyWithImages ??
      parseBoolean(readEnv(env, 'CATALOG_ONLY_WITH_IMAGES'), true, 'CATALOG_ONLY_WITH_IMAGES', problems),
    skipExisting:
      overrides.booleans.skipExisting ??
      parseBoolean(readEnv(env, 'IMAGES_SKIP_EXISTING'), false, 'IMAGES_SKIP_EXISTING', problems),
    insecureTls:
      overrides.booleans.insecureTls ?? parseBoolean(readEnv(env, 'API_INSECURE_TLS'), false, 'API_INSECURE_TLS', problems),
    verbose: overrides.booleans.verbose ?? parseBoolean(readEnv(env, 'IMAGES_VERBOSE'), false, 'IMAGES_VERBOSE', problems)
  };

  if (problems.length > 0 || apiBaseUrl === undefined || imageBaseUrl === undefined || !isSizeTag(preferredSize)) {
    throw new ConfigError(problems);
  }

  const outputDir = overrides.strings.outputDir ?? readEnv(env, 'IMAGES_OUTPUT_DIR') ?? path.join('data', 'raw_images');

  const config: SyncConfig = {
    apiBaseUrl,
    domainKey: readEnv(env, 'DOMAIN_KEY'),
    authToken: readEnv(env, 'AUTH_TOKEN'),
    imageBaseUrl,
    outputDir: path.resolve(cwd, outputDir),
    preferredSize,
    concurrency: integers.concurrency ?? 8,
    pageSize: integers.pageSize,
    requestTimeoutMs: integers.requestTimeoutMs ?? 30000,
    downloadTimeoutMs: integers.downloadTimeoutMs ?? 20000,
    maxPageAttempts: integers.maxPageAttempts ?? 3,
    pageRetryDelayMs: integers.pageRetryDelayMs ?? 1000,
    maxPages: integers.maxPages ?? 1000,
    downloadAttempts: integers.downloadAttempts ?? 1,
    progressEvery: integers.progressEvery ?? 25,
    userAgent: readEnv(env, 'IMAGES_USER_AGENT') ?? 'ProductImageSync/1.0',
    ...booleans
  };
  return Object.freeze(config);
}
