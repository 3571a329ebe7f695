/**
 * Configuration loading.
 *
 * Precedence, highest first: command-line flags, environment variables
 * (CHATCAP_HOST, CHATCAP_PORT, CHATCAP_OUTPUT), the JSON file named by
 * --config or CHATCAP_CONFIG, then the bundled chat profile.
 */

import { readFileSync } from 'fs';

import type {
  BaselinePolicy,
  ChatCapConfig,
  ChatProfile,
  ChatSelectors,
  ConfigOverrides,
  UrlHint,
} from '@/config/types.js';
import {
  booleanRule,
  integerRule,
  isRecord,
  nonEmptyStringRule,
  nullableRule,
  objectRule,
  oneOfRule,
  stringListRule,
  type ValidationRule,
} from '@/config/validation.js';
import {
  DEFAULT_CDP_PORT,
  DEFAULT_OUTPUT_FILE,
  HTTP_LOCALHOST,
  MAX_CAPTURE_INTERVAL_MS,
  MIN_CAPTURE_INTERVAL_MS,
  UTF8_ENCODING,
} from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';
import { ConfigError, getErrorMessage } from '@/utils/errors.js';
import { normalizeUrl } from '@/utils/url.js';

import defaultProfileJson from './chat-profile.default.json' with { type: 'json' };

const log = createLogger('config');

const PORT_RULE = integerRule({ min: 1, max: 65535 });
const INTERVAL_RULE = integerRule({ min: MIN_CAPTURE_INTERVAL_MS, max: MAX_CAPTURE_INTERVAL_MS });
const BASELINE_RULE = oneOfRule<BaselinePolicy>(['emit', 'skip']);
const STRING_RULE = nonEmptyStringRule();
const SELECTOR_LIST_RULE = stringListRule();
const OPTIONAL_LIST_RULE = stringListRule({ allowEmpty: true });
const TARGET_URL_RULE: ValidationRule<string | undefined> = nullableRule({
  validate: (value, field) => normalizeUrl(STRING_RULE.validate(value, field)),
});

const URL_HINTS_RULE: ValidationRule<UrlHint[]> = {
  validate: (value, field) => {
    if (!Array.isArray(value)) {
      throw new ConfigError(`${field} must be an array of { pattern, score } objects`);
    }
    const hint = objectRule((source, path) => ({
      pattern: STRING_RULE.validate(source['pattern'], `${path}.pattern`),
      score: integerRule({ min: 1 }).validate(source['score'], `${path}.score`),
    }));
    return value.map((entry, index) => hint.validate(entry, `${field}[${index}]`));
  },
};

const PROFILE_KEYS = [
  'targetUrl',
  'chatUrlHints',
  'selectors',
  'boilerplate',
  'noisePrefixes',
  'intervalMs',
  'baseline',
  'holdWhileStreaming',
];

/**
 * Reads one field, or inherits it from `base` when absent.
 */
function fieldReader(source: Record<string, unknown>, path: string) {
  return <T>(key: string, rule: ValidationRule<T>, inherited: (() => T) | undefined): T => {
    const field = `${path}${key}`;
    if (key in source) {
      return rule.validate(source[key], field);
    }
    if (!inherited) {
      throw new ConfigError(`${field} is required`);
    }
    return inherited();
  };
}

function readSelectors(source: Record<string, unknown>, path: string, base: ChatSelectors | undefined): ChatSelectors {
  const read = fieldReader(source, path);
  return {
    user: read('user', SELECTOR_LIST_RULE, base && (() => base.user)),
    ai: read('ai', SELECTOR_LIST_RULE, base && (() => base.ai)),
    streamingIndicators: read(
      'streamingIndicators',
      OPTIONAL_LIST_RULE,
      base && (() => base.streamingIndicators)
    ),
    loadingMessage: read('loadingMessage', STRING_RULE, base && (() => base.loadingMessage)),
    textbox: read('textbox', SELECTOR_LIST_RULE, base && (() => base.textbox)),
  };
}

/**
 * Validate a chat profile document.
 *
 * Fields missing from `raw` are taken from `base`; without a base every
 * field is required. Nested `selectors` and `boilerplate` merge per key.
 *
 * @throws ConfigError naming the first invalid field
 */
export function readProfile(raw: unknown, base?: ChatProfile): ChatProfile {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  for (const key of Object.keys(raw)) {
    if (!PROFILE_KEYS.includes(key)) {
      log.info(`Ignoring unknown configuration key "${key}"`);
    }
  }

  const read = fieldReader(raw, '');
  return {
    targetUrl: read('targetUrl', TARGET_URL_RULE, base && (() => base.targetUrl)),
    chatUrlHints: read('chatUrlHints', URL_HINTS_RULE, base && (() => base.chatUrlHints)),
    selectors: read(
      'selectors',
      objectRule((source, path) => readSelectors(source, `${path}.`, base?.selectors)),
      base && (() => base.selectors)
    ),
    boilerplate: read(
      'boilerplate',
      objectRule((source, path) => {
        const readNested = fieldReader(source, `${path}.`);
        return {
          prefixes: readNested('prefixes', OPTIONAL_LIST_RULE, base && (() => base.boilerplate.prefixes)),
          suffixes: readNested('suffixes', OPTIONAL_LIST_RULE, base && (() => base.boilerplate.suffixes)),
        };
      }),
      base && (() => base.boilerplate)
    ),
    noisePrefixes: read('noisePrefixes', OPTIONAL_LIST_RULE, base && (() => base.noisePrefixes)),
    intervalMs: read('intervalMs', INTERVAL_RULE, base && (() => base.intervalMs)),
    baseline: read('baseline', BASELINE_RULE, base && (() => base.baseline)),
    holdWhileStreaming: read(
      'holdWhileStreaming',
      booleanRule(),
      base && (() => base.holdWhileStreaming)
    ),
  };
}

/**
 * Bundled chat profile.
 */
export const DEFAULT_PROFILE: ChatProfile = readProfile(defaultProfileJson);

/**
 * Read and validate a JSON configuration file on top of the bundled profile.
 *
 * @throws ConfigError if the file cannot be read, is not JSON or has invalid fields
 */
export function loadProfileFile(filePath: string, base: ChatProfile = DEFAULT_PROFILE): ChatProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, UTF8_ENCODING));
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${filePath}: ${getErrorMessage(error)}`, {
      cause: error,
      suggestions: ['Check the --config path (or CHATCAP_CONFIG) and that the file is valid JSON'],
    });
  }

  try {
    const profile = readProfile(raw, base);
    log.debug(`Loaded configuration from ${filePath}`);
    return profile;
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`${filePath}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve the configuration for one command invocation.
 *
 * @param overrides - Values given on the command line
 * @param env - Environment (injectable for tests)
 * @throws ConfigError on any invalid value
 *
 * @example
 * ```typescript
 * const config = loadConfig({ port: '9333', baseline: 'skip' });
 * config.port;      // 9333
 * config.baseline;  // 'skip'
 * ```
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ChatCapConfig {
  const configPath = overrides.configPath ?? envValue(env, 'CHATCAP_CONFIG');
  const profile = configPath ? loadProfileFile(configPath) : DEFAULT_PROFILE;

  return {
    ...profile,
    host: STRING_RULE.validate(overrides.host ?? envValue(env, 'CHATCAP_HOST') ?? HTTP_LOCALHOST, 'host'),
    port: PORT_RULE.validate(overrides.port ?? envValue(env, 'CHATCAP_PORT') ?? DEFAULT_CDP_PORT, 'port'),
    output: STRING_RULE.validate(
      overrides.output ?? envValue(env, 'CHATCAP_OUTPUT') ?? DEFAULT_OUTPUT_FILE,
      'output'
    ),
    browserPath:
      overrides.browserPath === undefined ? undefined : STRING_RULE.validate(overrides.browserPath, 'browser-path'),
    targetUrl:
      overrides.targetUrl === undefined ? profile.targetUrl : TARGET_URL_RULE.validate(overrides.targetUrl, 'url'),
    intervalMs:
      overrides.intervalMs === undefined ? profile.intervalMs : INTERVAL_RULE.validate(overrides.intervalMs, 'interval'),
    baseline: overrides.baseline === undefined ? profile.baseline : BASELINE_RULE.validate(overrides.baseline, 'baseline'),
    holdWhileStreaming: overrides.holdWhileStreaming ?? profile.holdWhileStreaming,
  };
}
