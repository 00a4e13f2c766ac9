import * as fs from 'fs';
import * as path from 'path';
import { DatabaseConnection } from './connection';
import { logger } from '../utils/logger';

export interface Migration {
  version: number;
  name: string;
  up: string;
}

export class MigrationManager {
  private db: DatabaseConnection;
  private migrationsPath: string;
  private schemaPath: string;

  constructor(
    db: DatabaseConnection,
    migrationsPath: string = path.join(__dirname, 'migrations'),
    schemaPath: string = path.join(__dirname, 'schema.sql')
  ) {
    this.db = db;
    this.migrationsPath = migrationsPath;
    this.schemaPath = schemaPath;
  }

  async initialize(): Promise<void> {
    await this.db.run(`
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async getCurrentVersion(): Promise<number> {
    const result = await this.db.get<{ version: number | null }>(
      'SELECT MAX(version) as version FROM migrations'
    );
    return result?.version || 0;
  }

  loadMigrations(): Migration[] {
    const migrations: Migration[] = [];

    // Initial schema is migration 1
    if (fs.existsSync(this.schemaPath)) {
      migrations.push({
        version: 1,
        name: 'initial_schema',
        up: fs.readFileSync(this.schemaPath, 'utf8')
      });
    }

    // Additional migrations: NNN_name.sql
    if (fs.existsSync(this.migrationsPath)) {
      const files = fs.readdirSync(this.migrationsPath)
        .filter(file => file.endsWith('.sql'))
        .sort();

      for (const file of files) {
        const match = file.match(/^(\d+)_(.+)\.sql$/);
        if (match) {
          migrations.push({
            version: parseInt(match[1], 10),
            name: match[2],
            up: fs.readFileSync(path.join(this.migrationsPath, file), 'utf8')
          });
        }
      }
    }

    return migrations.sort((a, b) => a.version - b.version);
  }

  async migrate(): Promise<number> {
    await this.initialize();

    const currentVersion = await this.getCurrentVersion();
    const pendingMigrations = this.loadMigrations().filter(m => m.version > currentVersion);

    if (pendingMigrations.length === 0) {
      logger.debug('No pending migrations', { currentVersion });
      return 0;
    }

    logger.info(`Running ${pendingMigrations.length} migration(s)...`);

    for (const migration of pendingMigrations) {
      await this.db.transaction(async () => {
        const statements = migration.up
          .split(';')
          .map(s => s.replace(/^\s*--.*$/gm, '').trim())
          .filter(s => s.length > 0);

        for (const statement of statements) {
          await this.db.run(statement);
        }

        await this.db.run(
          'INSERT INTO migrations (version, name) VALUES (?, ?)',
          [migration.version, migration.name]
        );
      });

      logger.info(`Migration ${migration.version} applied`, { name: migration.name });
    }

    return pendingMigrations.length;
  }
}
