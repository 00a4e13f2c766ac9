import sqlite3 from 'sqlite3';

export interface DatabaseConfig {
  filename: string;
  busyTimeout?: number;
}

export type SqlParam = string | number | null;

export class DatabaseConnection {
  private db: sqlite3.Database | null = null;
  private config: Required<DatabaseConfig>;
  private isInitialized = false;

  constructor(config: DatabaseConfig) {
    this.config = {
      busyTimeout: 30000,
      ...config,
    };
  }

  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(this.config.filename, (err) => {
        if (err) {
          reject(new Error(`Failed to connect to database: ${err.message}`));
          return;
        }

        db.configure('busyTimeout', this.config.busyTimeout);
        this.db = db;
        this.isInitialized = true;
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close((err) => {
        if (err) {
          reject(new Error(`Failed to close database: ${err.message}`));
          return;
        }
        this.db = null;
        this.isInitialized = false;
        resolve();
      });
    });
  }

  private requireDb(): sqlite3.Database {
    if (!this.db) {
      throw new Error('Database not initialized');
    }
    return this.db;
  }

  async run(sql: string, params: SqlParam[] = []): Promise<sqlite3.RunResult> {
    const db = this.requireDb();

    return new Promise((resolve, reject) => {
      db.run(sql, params, function(err) {
        if (err) {
          reject(new Error(`Database run error: ${err.message}`));
          return;
        }
        resolve(this);
      });
    });
  }

  async get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb();

    return new Promise((resolve, reject) => {
      db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(new Error(`Database get error: ${err.message}`));
          return;
        }
        resolve(row);
      });
    });
  }

  async all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb();

    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(new Error(`Database all error: ${err.message}`));
          return;
        }
        resolve(rows);
      });
    });
  }

  async transaction<T>(callback: () => Promise<T>): Promise<T> {
    await this.run('BEGIN TRANSACTION');

    try {
      const result = await callback();
      await this.run('COMMIT');
      return result;
    } catch (error) {
      await this.run('ROLLBACK');
      throw error;
    }
  }

  isConnected(): boolean {
    return this.isInitialized && this.db !== null;
  }
}
