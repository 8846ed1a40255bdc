import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { EngineConfigFile, LogLevelSetting, MergedConfig } from './config-schema.js';
import { CONFIG_FILE_VERSION, DEFAULT_CONFIG, engineConfigFileSchema } from './config-schema.js';

const LOG_LEVELS: readonly LogLevelSetting[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevelSetting {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/engine.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: EngineConfigFile | null = null;
  private readonly warnings: string[] = [];

  constructor(configPath = DEFAULT_CONFIG.paths.config, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = this.deepClone(DEFAULT_CONFIG);
    config.paths.config = this.configPath;

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Raw config file as loaded (for debugging).
   */
  getLoadedConfigFile(): EngineConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Non-fatal problems found while loading. The logger does not exist yet at
   * load time, so the caller logs these.
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private async loadConfigFile(): Promise<EngineConfigFile | null> {
    const filePath = join(this.configPath, 'engine.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read config file: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Config file ${filePath} is not valid JSON: ${message}`);
    }

    const parsed = engineConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid config file ${filePath}: ${issues}`);
    }

    if (parsed.data.version > CONFIG_FILE_VERSION) {
      this.warnings.push(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  private mergeConfigFile(config: MergedConfig, file: EngineConfigFile): void {
    const learning = file.learning;
    if (learning) {
      config.learning = {
        patterns: { ...config.learning.patterns, ...learning.patterns },
        keywords: { ...config.learning.keywords, ...learning.keywords },
        sources: { ...config.learning.sources, ...learning.sources },
        feedback: { ...config.learning.feedback, ...learning.feedback },
        prediction: { ...config.learning.prediction, ...learning.prediction },
      };
    }

    if (file.storage) {
      config.storage = { ...config.storage, ...file.storage };
    }

    if (file.logging) {
      config.logging = { ...config.logging, ...file.logging };
    }

    const { patternWeight, keywordWeight } = config.learning.prediction;
    if (patternWeight + keywordWeight > 1) {
      throw new Error(
        `learning.prediction.patternWeight + keywordWeight must not exceed 1 (got ${String(patternWeight + keywordWeight)})`
      );
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.locks = join(dataPath, 'locks');
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
      config.storage.dbPath = join(dataPath, 'urgency.db');
    }

    const dbPath = this.env['URGENCY_DB_PATH'];
    if (dbPath) {
      config.storage.dbPath = dbPath;
    }
  }

  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}
