import * as fs from 'fs';
import * as path from 'path';
import { AppConfig } from '../config';
import { SettingsRepository } from '../models/settings-repository';
import { toError } from '../utils/error-handler';
import { logger } from '../utils/logger';
import { DatabaseConfig, DatabaseConnection } from './connection';
import { MigrationManager } from './migrations';

/**
 * Plugin storage: one SQLite file holding the settings table and its migration history.
 */
export class DatabaseManager {
  private readonly connection: DatabaseConnection;
  private readonly migrationManager: MigrationManager;
  private readonly settingsRepository: SettingsRepository;

  constructor(dbConfig: DatabaseConfig) {
    this.connection = new DatabaseConnection(dbConfig);
    this.migrationManager = new MigrationManager(this.connection);
    this.settingsRepository = new SettingsRepository(this.connection);
  }

  async initialize(): Promise<void> {
    await this.connection.initialize();
    const applied = await this.migrationManager.migrate();
    logger.debug('Plugin storage ready', { appliedMigrations: applied });
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  getConnection(): DatabaseConnection {
    return this.connection;
  }

  getMigrationManager(): MigrationManager {
    return this.migrationManager;
  }

  getSettingsRepository(): SettingsRepository {
    return this.settingsRepository;
  }

  // Healthy when the settings table can be read
  async healthCheck(): Promise<boolean> {
    if (!this.connection.isConnected()) {
      return false;
    }

    try {
      await this.connection.get<{ count: number }>('SELECT COUNT(*) AS count FROM plugin_settings');
      return true;
    } catch (error) {
      logger.warn('Plugin storage health check failed', {}, toError(error));
      return false;
    }
  }
}

export function createDatabaseConfig(appConfig: Pick<AppConfig, 'database'>): DatabaseConfig {
  const { path: filename, busyTimeout } = appConfig.database;

  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  return { filename, busyTimeout };
}
