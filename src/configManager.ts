import { access } from 'node:fs/promises';
import { watch as chokidarWatch } from 'chokidar';
import { defaultConfig, loadConfigFile } from './config.js';
import { createLogger, errorMessage, type Logger } from './logger.js';
import type { GatewayConfig } from './models.js';

export type ReloadCallback = (config: GatewayConfig) => void;

export interface FileWatcher {
  on: (event: 'change', handler: () => void) => unknown;
  close: () => Promise<void>;
}

export interface ConfigManagerDeps {
  /** File watcher factory; chokidar unless replaced. */
  watch?: (path: string) => FileWatcher;
  logger?: Logger;
  debounceMs?: number;
}

export interface ConfigStatus {
  loaded: boolean;
  configPath: string;
  endpointsCount: number;
  lastReload: string | null;
  lastReloadError: string | null;
  watching: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Loads the YAML configuration, keeps the last good copy, and notifies
 * listeners when the file changes on disk. An invalid edit is rejected and
 * the previous configuration stays in effect.
 */
export class ConfigManager {
  private config: GatewayConfig | undefined;
  private watcher: FileWatcher | undefined;
  private debounceTimer: NodeJS.Timeout | undefined;
  private lastReload: Date | undefined;
  private lastReloadError: string | undefined;
  private readonly callbacks: ReloadCallback[] = [];
  private readonly logger: Logger;
  private readonly debounceMs: number;

  constructor(
    readonly configPath: string,
    private readonly deps: ConfigManagerDeps = {}
  ) {
    this.logger = deps.logger ?? createLogger('config');
    this.debounceMs = deps.debounceMs ?? 300;
  }

  async load(): Promise<GatewayConfig> {
    if (!(await exists(this.configPath))) {
      this.logger.warn('Configuration file not found, using defaults', { path: this.configPath });
      this.config = defaultConfig();
      return this.config;
    }

    try {
      this.config = await loadConfigFile(this.configPath);
      this.lastReload = new Date();
      this.lastReloadError = undefined;
      this.logger.info('Configuration loaded', {
        path: this.configPath,
        endpoints: this.config.endpoints.length,
      });
      return this.config;
    } catch (err) {
      this.lastReloadError = errorMessage(err);
      this.logger.error('Failed to load configuration', { path: this.configPath, error: this.lastReloadError });
      throw err;
    }
  }

  /** Re-reads the file and runs every reload callback; the previous config survives a failure. */
  async reload(): Promise<GatewayConfig> {
    const config = await this.load();
    for (const callback of this.callbacks) {
      try {
        callback(config);
      } catch (err) {
        this.logger.error('Error in config reload callback', { error: errorMessage(err) });
      }
    }
    this.logger.info('Configuration reloaded');
    return config;
  }

  onReload(callback: ReloadCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      const index = this.callbacks.indexOf(callback);
      if (index !== -1) this.callbacks.splice(index, 1);
    };
  }

  getConfig(): GatewayConfig | undefined {
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== undefined;
  }

  startWatching(): void {
    if (this.watcher) return;

    const watcher: FileWatcher = this.deps.watch
      ? this.deps.watch(this.configPath)
      : chokidarWatch(this.configPath, { ignoreInitial: true });
    watcher.on('change', () => this.handleChange());
    this.watcher = watcher;
    this.logger.info('Watching configuration file', { path: this.configPath });
  }

  async stopWatching(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
      this.logger.info('Stopped watching configuration file');
    }
  }

  getStatus(): ConfigStatus {
    return {
      loaded: this.isLoaded(),
      configPath: this.configPath,
      endpointsCount: this.config?.endpoints.length ?? 0,
      lastReload: this.lastReload?.toISOString() ?? null,
      lastReloadError: this.lastReloadError ?? null,
      watching: this.watcher !== undefined,
    };
  }

  async validateFile(path: string): Promise<{ valid: boolean; error: string | null }> {
    try {
      await loadConfigFile(path);
      return { valid: true, error: null };
    } catch (err) {
      return { valid: false, error: errorMessage(err) };
    }
  }

  private handleChange(): void {
    this.logger.info('Configuration file changed', { path: this.configPath });
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined;
      this.reload().catch((err: unknown) => {
        this.logger.error('Failed to reload configuration', { error: errorMessage(err) });
      });
    }, this.debounceMs);
  }
}
