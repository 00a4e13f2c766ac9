import { DatabaseConnection } from '../../../src/database/connection';
import { DatabaseManager, createDatabaseConfig } from '../../../src/database/manager';

interface KeyValueRow {
  key: string;
  value: string;
}

describe('DatabaseConnection', () => {
  let connection: DatabaseConnection;

  beforeEach(async () => {
    connection = new DatabaseConnection({ filename: ':memory:', busyTimeout: 5000 });
    await connection.initialize();
    await connection.run('CREATE TABLE kv (key TEXT PRIMARY KEY, value TEXT NOT NULL)');
  });

  afterEach(async () => {
    await connection.close();
  });

  test('should report the connection state', async () => {
    expect(connection.isConnected()).toBe(true);

    await connection.close();
    expect(connection.isConnected()).toBe(false);
  });

  test('should report affected rows from run', async () => {
    await connection.run('INSERT INTO kv (key, value) VALUES (?, ?)', ['a', '1']);

    const result = await connection.run('UPDATE kv SET value = ? WHERE key = ?', ['2', 'a']);
    expect(result.changes).toBe(1);
  });

  test('should read a single row or undefined', async () => {
    await connection.run('INSERT INTO kv (key, value) VALUES (?, ?)', ['dashboard_settings', '{}']);

    expect(await connection.get<KeyValueRow>('SELECT * FROM kv WHERE key = ?', ['dashboard_settings']))
      .toEqual({ key: 'dashboard_settings', value: '{}' });
    expect(await connection.get<KeyValueRow>('SELECT * FROM kv WHERE key = ?', ['missing'])).toBeUndefined();
  });

  test('should read all rows', async () => {
    await connection.run('INSERT INTO kv (key, value) VALUES (?, ?)', ['b', '2']);
    await connection.run('INSERT INTO kv (key, value) VALUES (?, ?)', ['a', '1']);

    const rows = await connection.all<KeyValueRow>('SELECT * FROM kv ORDER BY key');
    expect(rows.map(row => row.key)).toEqual(['a', 'b']);
  });

  test('should commit a transaction', async () => {
    await connection.transaction(async () => {
      await connection.run('INSERT INTO kv (key, value) VALUES (?, ?)', ['a', '1']);
      await connection.run('INSERT INTO kv (key, value) VALUES (?, ?)', ['b', '2']);
    });

    expect(await connection.all('SELECT * FROM kv')).toHaveLength(2);
  });

  test('should roll back a failed transaction and rethrow', async () => {
    await expect(connection.transaction(async () => {
      await connection.run('INSERT INTO kv (key, value) VALUES (?, ?)', ['a', '1']);
      throw new Error('write aborted');
    })).rejects.toThrow('write aborted');

    expect(await connection.all('SELECT * FROM kv')).toHaveLength(0);
  });
});

describe('DatabaseManager', () => {
  let manager: DatabaseManager;

  beforeEach(async () => {
    manager = new DatabaseManager(createDatabaseConfig({ database: { path: ':memory:', busyTimeout: 5000 } }));
    await manager.initialize();
  });

  afterEach(async () => {
    await manager.close();
  });

  test('should create the plugin settings table', async () => {
    const tables = await manager.getConnection().all<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name"
    );

    expect(tables.map(t => t.name)).toEqual(['migrations', 'plugin_settings']);
    expect(await manager.getMigrationManager().getCurrentVersion()).toBe(1);
  });

  test('should not reapply migrations', async () => {
    expect(await manager.getMigrationManager().migrate()).toBe(0);
  });

  test('should hand out a settings repository on the same connection', async () => {
    await manager.getSettingsRepository().upsert({ key: 'dashboard_settings', value: {}, version: '1.0.0' });

    const row = await manager.getConnection().get<{ count: number }>('SELECT COUNT(*) AS count FROM plugin_settings');
    expect(row?.count).toBe(1);
  });

  test('should pass the health check while open', async () => {
    expect(await manager.healthCheck()).toBe(true);
  });

  test('should fail the health check once closed', async () => {
    await manager.close();
    expect(await manager.healthCheck()).toBe(false);
  });
});
