/**
 * Configuration for scans and the query server.
 *
 * Loads optional overrides from frontmatter-query.json in the working
 * directory, then applies FMQ_* environment variables on top.
 */

import fs from 'fs-extra';
import * as os from 'node:os';
import * as path from 'node:path';

export const CONFIG_FILE_NAME = 'frontmatter-query.json';

export interface AppConfig {
  /** Number of notes read and parsed at once */
  concurrency: number;
  /** File extensions treated as notes, with leading dot */
  extensions: string[];
  /** Scan entries whose name starts with "." */
  includeHidden: boolean;
  /** Repair colon-in-value frontmatter when the strict parse fails */
  lenient: boolean;
  /** Port for `fmq serve` */
  port: number;
}

export function defaultConfig(): AppConfig {
  return {
    concurrency: Math.max(1, os.availableParallelism()),
    extensions: ['.md'],
    includeHidden: false,
    lenient: true,
    port: 4000
  };
}

function positiveInt(value: unknown): number | undefined {
  const n = typeof value === 'string' ? parseInt(value, 10) : value;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : undefined;
}

function extensionList(value: unknown): string[] | undefined {
  const items = typeof value === 'string' ? value.split(',') : value;
  if (!Array.isArray(items) || items.length === 0) {
    return undefined;
  }
  const extensions: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string' || item.trim() === '') return undefined;
    const ext = item.trim();
    extensions.push(ext.startsWith('.') ? ext : `.${ext}`);
  }
  return extensions;
}

/**
 * Merge raw settings (config file or env) onto a config, warning about
 * values that cannot be used.
 */
export function applySettings(config: AppConfig, settings: Record<string, unknown>, origin: string): AppConfig {
  const merged = { ...config };

  for (const [key, raw] of Object.entries(settings)) {
    if (raw === undefined) continue;
    switch (key) {
      case 'concurrency':
      case 'port': {
        const n = positiveInt(raw);
        if (n === undefined) {
          console.warn(`Ignoring invalid ${key} in ${origin}: ${String(raw)}`);
        } else {
          merged[key] = n;
        }
        break;
      }
      case 'extensions': {
        const list = extensionList(raw);
        if (list === undefined) {
          console.warn(`Ignoring invalid extensions in ${origin}`);
        } else {
          merged.extensions = list;
        }
        break;
      }
      case 'includeHidden':
      case 'lenient':
        if (typeof raw === 'boolean') {
          merged[key] = raw;
        } else {
          console.warn(`Ignoring invalid ${key} in ${origin}: ${String(raw)}`);
        }
        break;
      default:
        console.warn(`Unknown setting "${key}" in ${origin}`);
    }
  }

  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Settings from the config file, or undefined when it is absent or unusable.
 */
async function readConfigFile(configPath: string): Promise<Record<string, unknown> | undefined> {
  if (!(await fs.pathExists(configPath))) {
    return undefined;
  }

  let fileSettings: unknown;
  try {
    fileSettings = await fs.readJson(configPath);
  } catch (err) {
    console.warn(`Could not read ${CONFIG_FILE_NAME}, using defaults: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }

  if (!isRecord(fileSettings)) {
    console.warn(`${CONFIG_FILE_NAME} must contain a JSON object, using defaults`);
    return undefined;
  }
  return fileSettings;
}

/**
 * Load configuration: defaults, then the config file in `cwd`, then env.
 */
export async function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  let config = defaultConfig();

  const fileSettings = await readConfigFile(path.join(cwd, CONFIG_FILE_NAME));
  if (fileSettings) {
    config = applySettings(config, fileSettings, CONFIG_FILE_NAME);
  }

  return applySettings(config, {
    concurrency: env.FMQ_CONCURRENCY,
    port: env.FMQ_PORT,
    extensions: env.FMQ_EXTENSIONS
  }, 'environment');
}
