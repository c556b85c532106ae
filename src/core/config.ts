import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { VoxConfigSchema, type VoxConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: VoxConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir ?? join(homedir(), '.voxgrid');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: RawConfig): VoxConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.voxgrid.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = VoxConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): VoxConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Create a commented default global config if none exists
   */
  createDefaultConfig(): string {
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    if (!existsSync(configPath)) {
      const defaultConfig = `# voxgrid configuration
screen:
  width: 1920
  height: 1080

grid:
  defaultSize: 9

textProcessing:
  commandOnlyMode: true
  commandWords:
    delete that: undo_last
    scratch that: undo_last

customCommands:
  enabled: false
  commands: []
  # - trigger: sign off
  #   action:
  #     type: type_text
  #     text: "Best regards"
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const screen: RawConfig = isRecord(raw.screen) ? { ...raw.screen } : {};
    const logging: RawConfig = isRecord(raw.logging) ? { ...raw.logging } : {};
    const textProcessing: RawConfig = isRecord(raw.textProcessing) ? { ...raw.textProcessing } : {};

    if (process.env.VOXGRID_SCREEN_WIDTH) {
      screen.width = Number(process.env.VOXGRID_SCREEN_WIDTH);
    }
    if (process.env.VOXGRID_SCREEN_HEIGHT) {
      screen.height = Number(process.env.VOXGRID_SCREEN_HEIGHT);
    }
    if (process.env.VOXGRID_LOG_LEVEL) {
      logging.level = process.env.VOXGRID_LOG_LEVEL;
    }
    if (process.env.VOXGRID_COMMAND_ONLY) {
      textProcessing.commandOnlyMode = process.env.VOXGRID_COMMAND_ONLY !== 'false';
    }

    return { ...raw, screen, logging, textProcessing };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const current = target[key];
      if (isRecord(next) && isRecord(current)) {
        result[key] = this.deepMerge(current, next);
      } else {
        result[key] = next;
      }
    }
    return result;
  }
}

/**
 * Read-only nested lookup over a configuration tree.
 * Missing keys and non-object steps resolve to the supplied default.
 */
export class ConfigStore {
  constructor(private readonly tree: RawConfig) {}

  static from(config: VoxConfig): ConfigStore {
    return new ConfigStore(config);
  }

  get(path: readonly string[], defaultValue?: unknown): unknown {
    let value: unknown = this.tree;
    for (const key of path) {
      if (!isRecord(value)) return defaultValue;
      value = value[key];
      if (value === undefined || value === null) return defaultValue;
    }
    return value;
  }

  getString(path: readonly string[], defaultValue: string): string {
    const value = this.get(path, defaultValue);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(path: readonly string[], defaultValue: number): number {
    const value = this.get(path, defaultValue);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  getBoolean(path: readonly string[], defaultValue: boolean): boolean {
    const value = this.get(path, defaultValue);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  getRecord(path: readonly string[]): Record<string, unknown> {
    const value = this.get(path, {});
    return isRecord(value) ? value : {};
  }
}
