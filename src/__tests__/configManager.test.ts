import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigManager, type FileWatcher } from '../configManager.js';
import { ConfigurationError } from '../errors.js';
import { silentLogger } from './helpers.js';

const ONE_ENDPOINT = 'endpoints:\n  - url: https://users.example.test\n    name: users\n';
const TWO_ENDPOINTS = `${ONE_ENDPOINT}  - url: https://orders.example.test\n    name: orders\n`;

function fakeWatcher() {
  const handlers: Array<() => void> = [];
  const watcher = {
    on: vi.fn((_event: 'change', handler: () => void) => {
      handlers.push(handler);
    }),
    close: vi.fn(async () => {}),
  } satisfies FileWatcher;
  return { watcher, emitChange: () => handlers.forEach((handler) => handler()) };
}

describe('ConfigManager', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'orchestrator-config-'));
    configPath = join(dir, 'config.yaml');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('falls back to defaults when the file is missing', async () => {
      const logger = silentLogger();
      const manager = new ConfigManager(configPath, { logger });

      const config = await manager.load();

      expect(config.endpoints).toEqual([]);
      expect(manager.isLoaded()).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith('Configuration file not found, using defaults', { path: configPath });
      expect(manager.getStatus().lastReload).toBeNull();
    });

    it('parses the file', async () => {
      await writeFile(configPath, TWO_ENDPOINTS);
      const manager = new ConfigManager(configPath, { logger: silentLogger() });

      const config = await manager.load();

      expect(config.endpoints.map((e) => e.name)).toEqual(['users', 'orders']);
      expect(manager.getConfig()).toBe(config);
      expect(manager.getStatus()).toMatchObject({
        loaded: true,
        configPath,
        endpointsCount: 2,
        lastReloadError: null,
        watching: false,
      });
    });

    it('rejects an invalid file', async () => {
      await writeFile(configPath, 'endpoints:\n  - url: nope\n');
      const manager = new ConfigManager(configPath, { logger: silentLogger() });

      await expect(manager.load()).rejects.toBeInstanceOf(ConfigurationError);
      expect(manager.isLoaded()).toBe(false);
    });
  });

  describe('reload', () => {
    it('notifies every subscriber with the new configuration', async () => {
      await writeFile(configPath, ONE_ENDPOINT);
      const manager = new ConfigManager(configPath, { logger: silentLogger() });
      await manager.load();
      const first = vi.fn();
      const second = vi.fn();
      manager.onReload(first);
      manager.onReload(second);

      await writeFile(configPath, TWO_ENDPOINTS);
      const config = await manager.reload();

      expect(config.endpoints).toHaveLength(2);
      expect(first).toHaveBeenCalledWith(config);
      expect(second).toHaveBeenCalledWith(config);
    });

    it('keeps notifying after a subscriber throws', async () => {
      await writeFile(configPath, ONE_ENDPOINT);
      const manager = new ConfigManager(configPath, { logger: silentLogger() });
      const after = vi.fn();
      manager.onReload(() => {
        throw new Error('subscriber failed');
      });
      manager.onReload(after);

      await manager.reload();

      expect(after).toHaveBeenCalledTimes(1);
    });

    it('stops notifying an unsubscribed callback', async () => {
      await writeFile(configPath, ONE_ENDPOINT);
      const manager = new ConfigManager(configPath, { logger: silentLogger() });
      const callback = vi.fn();
      const unsubscribe = manager.onReload(callback);

      unsubscribe();
      await manager.reload();

      expect(callback).not.toHaveBeenCalled();
    });

    it('keeps the previous configuration when the new file is invalid', async () => {
      await writeFile(configPath, ONE_ENDPOINT);
      const manager = new ConfigManager(configPath, { logger: silentLogger() });
      const previous = await manager.load();
      const callback = vi.fn();
      manager.onReload(callback);

      await writeFile(configPath, 'health_check:\n  interval: 1\n');
      await expect(manager.reload()).rejects.toBeInstanceOf(ConfigurationError);

      expect(manager.getConfig()).toBe(previous);
      expect(callback).not.toHaveBeenCalled();
      expect(manager.getStatus().lastReloadError).toMatch(/health_check\.interval/);
    });
  });

  describe('watching', () => {
    it('reloads once per burst of change events', async () => {
      await writeFile(configPath, ONE_ENDPOINT);
      const { watcher, emitChange } = fakeWatcher();
      const manager = new ConfigManager(configPath, {
        logger: silentLogger(),
        watch: () => watcher,
        debounceMs: 20,
      });
      await manager.load();
      const callback = vi.fn();
      manager.onReload(callback);

      manager.startWatching();
      expect(manager.getStatus().watching).toBe(true);

      await writeFile(configPath, TWO_ENDPOINTS);
      emitChange();
      emitChange();
      emitChange();

      await vi.waitFor(() => expect(callback).toHaveBeenCalledTimes(1));
      expect(manager.getConfig()?.endpoints).toHaveLength(2);

      await manager.stopWatching();
    });

    it('closes the watcher on stop', async () => {
      const { watcher } = fakeWatcher();
      const manager = new ConfigManager(configPath, { logger: silentLogger(), watch: () => watcher });

      manager.startWatching();
      manager.startWatching();
      await manager.stopWatching();

      expect(watcher.on).toHaveBeenCalledTimes(1);
      expect(watcher.close).toHaveBeenCalledTimes(1);
      expect(manager.getStatus().watching).toBe(false);
    });
  });

  describe('validateFile', () => {
    it('reports a valid file', async () => {
      await writeFile(configPath, ONE_ENDPOINT);
      const manager = new ConfigManager(configPath, { logger: silentLogger() });

      await expect(manager.validateFile(configPath)).resolves.toEqual({ valid: true, error: null });
    });

    it('reports an invalid or missing file', async () => {
      await writeFile(configPath, 'log_level: verbose\n');
      const manager = new ConfigManager(configPath, { logger: silentLogger() });

      const invalid = await manager.validateFile(configPath);
      expect(invalid.valid).toBe(false);
      expect(invalid.error).toMatch(/^Configuration validation error in /);

      const missing = await manager.validateFile(join(dir, 'absent.yaml'));
      expect(missing.valid).toBe(false);
      expect(missing.error).toMatch(/ENOENT/);
    });
  });
});
