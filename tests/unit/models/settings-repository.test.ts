import { DatabaseManager, createDatabaseConfig } from '../../../src/database/manager';
import { SettingsRepository } from '../../../src/models/settings-repository';
import { ValidationError } from '../../../src/models/base-repository';

describe('SettingsRepository', () => {
  let dbManager: DatabaseManager;
  let settingsRepo: SettingsRepository;

  beforeEach(async () => {
    dbManager = new DatabaseManager(createDatabaseConfig({ database: { path: ':memory:', busyTimeout: 5000 } }));
    await dbManager.initialize();
    settingsRepo = dbManager.getSettingsRepository();
  });

  afterEach(async () => {
    await dbManager.close();
  });

  describe('upsert', () => {
    it('should store a new setting', async () => {
      const setting = await settingsRepo.upsert({
        key: 'dashboard_settings',
        value: { repositories: ['octo-org/widgets'], refresh_interval: 120 },
        version: '1.0.0'
      });

      expect(setting.key).toBe('dashboard_settings');
      expect(setting.value).toEqual({ repositories: ['octo-org/widgets'], refresh_interval: 120 });
      expect(setting.version).toBe('1.0.0');
      expect(setting.updatedAt).toBeInstanceOf(Date);
    });

    it('should replace an existing setting', async () => {
      await settingsRepo.upsert({ key: 'dashboard_settings', value: { compact_view: false }, version: '1.0.0' });
      await settingsRepo.upsert({ key: 'dashboard_settings', value: { compact_view: true }, version: '1.1.0' });

      const all = await settingsRepo.findAll();
      expect(all).toHaveLength(1);
      expect(all[0].value).toEqual({ compact_view: true });
      expect(all[0].version).toBe('1.1.0');
    });

    it('should sanitize the key', async () => {
      const setting = await settingsRepo.upsert({ key: '  dashboard_settings  ', value: 1, version: '1.0.0' });
      expect(setting.key).toBe('dashboard_settings');
    });

    it('should throw validation error for an empty key', async () => {
      await expect(settingsRepo.upsert({ key: '', value: {}, version: '1.0.0' })).rejects.toThrow(ValidationError);
    });

    it('should throw validation error for a value that cannot be serialized', async () => {
      await expect(
        settingsRepo.upsert({ key: 'dashboard_settings', value: undefined, version: '1.0.0' })
      ).rejects.toThrow('value must be JSON-serializable');
    });
  });

  describe('findById', () => {
    it('should return null for a missing key', async () => {
      expect(await settingsRepo.findById('dashboard_settings')).toBeNull();
    });

    it('should round-trip the stored document', async () => {
      await settingsRepo.upsert({
        key: 'dashboard_settings',
        value: { github_token: '', repositories: [] },
        version: '1.0.0'
      });

      const setting = await settingsRepo.findById('dashboard_settings');
      expect(setting?.value).toEqual({ github_token: '', repositories: [] });
      expect(setting?.version).toBe('1.0.0');
    });

    it('should reject a stored value that is not JSON', async () => {
      await dbManager.getConnection().run(
        'INSERT INTO plugin_settings (key, value, version, updated_at) VALUES (?, ?, ?, ?)',
        ['broken', '{not json', '1.0.0', new Date().toISOString()]
      );

      await expect(settingsRepo.findById('broken')).rejects.toThrow("Stored value for 'broken' is not valid JSON");
    });
  });

  describe('delete', () => {
    it('should delete an existing setting', async () => {
      await settingsRepo.upsert({ key: 'dashboard_settings', value: {}, version: '1.0.0' });

      expect(await settingsRepo.delete('dashboard_settings')).toBe(true);
      expect(await settingsRepo.findById('dashboard_settings')).toBeNull();
    });

    it('should return false for a missing setting', async () => {
      expect(await settingsRepo.delete('missing')).toBe(false);
    });
  });
});
