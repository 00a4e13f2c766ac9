import {
  defaultSettings,
  normalizeSettings,
  readStoredSettings,
  redactStoredSettings,
  toStoredSettings,
  NormalizedSettings,
} from '../config/settings';
import { SettingsRepository } from '../models/settings-repository';
import { DashboardSettings, PluginSetting, StoredDashboardSettings } from '../models/types';
import { EncryptionUtil } from '../utils/encryption';
import { StorageError, toError } from '../utils/error-handler';
import { logger } from '../utils/logger';

export type SettingsStore = Pick<SettingsRepository, 'findById' | 'upsert'>;

export interface SettingsServiceOptions {
  settingsKey: string;
  settingsVersion: string;
  encryption: EncryptionUtil;
}

/**
 * Owns the live dashboard settings. Reads and replacements are synchronous so the
 * refresh timer and message handlers always observe a complete settings object;
 * writes to storage are chained so they land in call order.
 */
export class SettingsService {
  private current: DashboardSettings = defaultSettings();
  private persistChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: SettingsStore,
    private readonly options: SettingsServiceOptions
  ) {}

  async load(): Promise<NormalizedSettings> {
    let stored: PluginSetting | null;
    try {
      stored = await this.store.findById(this.options.settingsKey);
    } catch (error) {
      throw new StorageError('Failed to load settings', toError(error));
    }

    if (!stored) {
      logger.info('No stored settings found, using defaults', { key: this.options.settingsKey });
      this.current = defaultSettings();
      return { settings: this.get(), warnings: [] };
    }

    const read = readStoredSettings(stored.value);
    if (!read) {
      logger.warn('Stored settings have an invalid format, using defaults', { key: this.options.settingsKey });
      this.current = defaultSettings();
      return { settings: this.get(), warnings: ['Stored settings have an invalid format'] };
    }

    const warnings = read.skipped.map(field => `Ignoring stored field '${field}' with unexpected type`);
    const raw = { ...read.settings, githubToken: this.decryptToken(read.settings.githubToken, warnings) };

    const normalized = normalizeSettings(raw);
    this.current = normalized.settings;
    warnings.push(...normalized.warnings);
    this.logWarnings(warnings);

    logger.info('Loaded settings', {
      repositories: this.current.repositories.length,
      refreshInterval: this.current.refreshInterval,
      storedVersion: stored.version,
    });

    return { settings: this.get(), warnings };
  }

  get(): DashboardSettings {
    return { ...this.current, repositories: [...this.current.repositories] };
  }

  hasToken(): boolean {
    return this.current.githubToken !== undefined;
  }

  getToken(): string | undefined {
    return this.current.githubToken;
  }

  getRepositories(): readonly string[] {
    return this.current.repositories;
  }

  getCacheTimeout(): number {
    return this.current.cacheTimeout;
  }

  /**
   * Replaces the settings with a clamped copy of `next` and writes them to storage.
   * The in-memory replacement stands even if the write fails.
   */
  async replace(next: DashboardSettings): Promise<NormalizedSettings> {
    const normalized = normalizeSettings(next);
    this.current = normalized.settings;
    this.logWarnings(normalized.warnings);

    await this.persist();

    logger.info('Settings updated', { repositories: this.current.repositories.length });
    return { settings: this.get(), warnings: normalized.warnings };
  }

  persist(): Promise<void> {
    const snapshot = this.toStored(this.current);
    const write = this.persistChain.then(() => this.write(snapshot));
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.persistChain = write.catch(() => undefined);
    return write;
  }

  toWire(options: { redactToken: boolean }): StoredDashboardSettings {
    const wire = toStoredSettings(this.current);
    return options.redactToken ? redactStoredSettings(wire) : wire;
  }

  private async write(snapshot: StoredDashboardSettings): Promise<void> {
    try {
      await this.store.upsert({
        key: this.options.settingsKey,
        value: snapshot,
        version: this.options.settingsVersion,
      });
    } catch (error) {
      throw new StorageError('Failed to save settings', toError(error));
    }
  }

  private toStored(settings: DashboardSettings): StoredDashboardSettings {
    const stored = toStoredSettings(settings);
    if (stored.github_token) {
      stored.github_token = this.options.encryption.encrypt(stored.github_token);
    }
    return stored;
  }

  private decryptToken(token: string | undefined, warnings: string[]): string | undefined {
    if (!token || !EncryptionUtil.isEncrypted(token)) {
      return token;
    }

    try {
      return this.options.encryption.decrypt(token);
    } catch (error) {
      warnings.push('Stored GitHub token could not be decrypted; it has been ignored');
      return undefined;
    }
  }

  private logWarnings(warnings: string[]): void {
    for (const warning of warnings) {
      logger.warn(warning);
    }
  }
}
