import { DatabaseConnection } from '../database/connection';
import { AbstractRepository, validateString, sanitizeString, ValidationError } from './base-repository';
import { PluginSetting, UpsertPluginSettingInput } from './types';

interface PluginSettingRow {
  key: string;
  value: string;
  version: string;
  updated_at: string;
}

/**
 * Key/value plugin storage. Values are JSON documents tagged with the schema version that wrote them.
 */
export class SettingsRepository extends AbstractRepository<PluginSetting, UpsertPluginSettingInput> {
  constructor(db: DatabaseConnection) {
    super(db, 'plugin_settings', 'key');
  }

  async findById(key: string): Promise<PluginSetting | null> {
    validateString(key, 'key', 1, 255);

    const row = await this.db.get<PluginSettingRow>(
      'SELECT * FROM plugin_settings WHERE key = ?',
      [sanitizeString(key)]
    );

    return row ? this.mapRowToSetting(row) : null;
  }

  async findAll(): Promise<PluginSetting[]> {
    const rows = await this.db.all<PluginSettingRow>('SELECT * FROM plugin_settings ORDER BY key');
    return rows.map(row => this.mapRowToSetting(row));
  }

  async upsert(input: UpsertPluginSettingInput): Promise<PluginSetting> {
    validateString(input.key, 'key', 1, 255);
    validateString(input.version, 'version', 1, 32);

    const key = sanitizeString(input.key);
    const version = sanitizeString(input.version);
    const serialized = JSON.stringify(input.value);
    if (serialized === undefined) {
      throw new ValidationError('value must be JSON-serializable', 'value');
    }

    const now = new Date();

    try {
      await this.db.run(
        `INSERT INTO plugin_settings (key, value, version, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           value = excluded.value,
           version = excluded.version,
           updated_at = excluded.updated_at`,
        [key, serialized, version, now.toISOString()]
      );
    } catch (error) {
      throw new Error(`Failed to store setting '${key}': ${error instanceof Error ? error.message : String(error)}`);
    }

    return {
      key,
      value: JSON.parse(serialized),
      version,
      updatedAt: now
    };
  }

  private mapRowToSetting(row: PluginSettingRow): PluginSetting {
    let value: unknown;
    try {
      value = JSON.parse(row.value);
    } catch (error) {
      throw new Error(`Stored value for '${row.key}' is not valid JSON`);
    }

    return {
      key: row.key,
      value,
      version: row.version,
      updatedAt: new Date(row.updated_at)
    };
  }
}
