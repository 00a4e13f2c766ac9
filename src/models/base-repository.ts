import { DatabaseConnection } from '../database/connection';

// Base repository interface for keyed records
export interface BaseRepository<T, UpsertInput> {
  findById(id: string): Promise<T | null>;
  findAll(): Promise<T[]>;
  upsert(input: UpsertInput): Promise<T>;
  delete(id: string): Promise<boolean>;
}

// Base repository implementation with common functionality
export abstract class AbstractRepository<T, UpsertInput> implements BaseRepository<T, UpsertInput> {
  protected db: DatabaseConnection;
  protected tableName: string;
  protected idColumn: string;

  constructor(db: DatabaseConnection, tableName: string, idColumn = 'id') {
    this.db = db;
    this.tableName = tableName;
    this.idColumn = idColumn;
  }

  abstract findById(id: string): Promise<T | null>;
  abstract findAll(): Promise<T[]>;
  abstract upsert(input: UpsertInput): Promise<T>;

  async delete(id: string): Promise<boolean> {
    try {
      const result = await this.db.run(
        `DELETE FROM ${this.tableName} WHERE ${this.idColumn} = ?`,
        [id]
      );
      return result.changes > 0;
    } catch (error) {
      throw new Error(`Failed to delete from ${this.tableName}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

// Validation utilities
export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function validateString(value: unknown, fieldName: string, minLength = 0, maxLength = Infinity): asserts value is string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`, fieldName);
  }

  if (value.length < minLength) {
    throw new ValidationError(`${fieldName} must be at least ${minLength} characters`, fieldName);
  }

  if (value.length > maxLength) {
    throw new ValidationError(`${fieldName} must be at most ${maxLength} characters`, fieldName);
  }
}

export function sanitizeString(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}
