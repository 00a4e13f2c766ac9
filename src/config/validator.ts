import { AppConfig, DEFAULT_ENCRYPTION_KEY } from './index';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export class ConfigValidator {
  static validate(config: AppConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    // Required fields validation
    this.validateRequired(config, errors);

    // Type and range validation
    this.validateTypes(config, errors, warnings);

    // Environment-specific validation
    this.validateEnvironment(config, errors, warnings);

    // Security validation
    this.validateSecurity(config, errors, warnings);

    // Network configuration validation
    this.validateNetwork(config, errors);

    return {
      isValid: errors.length === 0,
      errors,
      warnings,
    };
  }

  private static validateRequired(config: AppConfig, errors: string[]): void {
    const requiredFields = [
      { path: 'plugin.settingsKey', value: config.plugin.settingsKey },
      { path: 'plugin.settingsVersion', value: config.plugin.settingsVersion },
      { path: 'database.path', value: config.database.path },
      { path: 'github.apiBaseUrl', value: config.github.apiBaseUrl },
      { path: 'github.userAgent', value: config.github.userAgent },
    ];

    for (const field of requiredFields) {
      if (!field.value || field.value.trim() === '') {
        errors.push(`Required field '${field.path}' is missing or empty`);
      }
    }
  }

  private static validateTypes(config: AppConfig, errors: string[], warnings: string[]): void {
    const timeout = config.github.requestTimeout;
    if (!Number.isInteger(timeout) || timeout < 1000 || timeout > 120000) {
      errors.push('github.requestTimeout must be an integer between 1000 and 120000ms');
    } else if (timeout < 10000 || timeout > 30000) {
      warnings.push('github.requestTimeout outside the recommended 10000-30000ms range');
    }

    if (!Number.isInteger(config.database.busyTimeout) || config.database.busyTimeout < 1000) {
      errors.push('database.busyTimeout must be an integer >= 1000ms');
    }

    if (!/^\d+\.\d+\.\d+$/.test(config.plugin.settingsVersion)) {
      errors.push('plugin.settingsVersion must be a semantic version (x.y.z)');
    }

    const validLogLevels = ['error', 'warn', 'info', 'debug'];
    if (!validLogLevels.includes(config.logging.level)) {
      errors.push(`logging.level must be one of: ${validLogLevels.join(', ')}`);
    }
  }

  private static validateEnvironment(config: AppConfig, errors: string[], warnings: string[]): void {
    if (config.isProduction) {
      if (config.security.encryptionKey === DEFAULT_ENCRYPTION_KEY) {
        errors.push('ENCRYPTION_KEY must be explicitly set in production');
      }

      if (config.logging.level === 'debug') {
        warnings.push('Debug logging enabled in production - consider using info or warn level');
      }

      if (!config.logging.toFile) {
        warnings.push('File logging disabled in production - logs may be lost');
      }
    }

    if (config.isTest && config.database.path !== ':memory:') {
      warnings.push('Test environment should use in-memory database');
    }
  }

  private static validateSecurity(config: AppConfig, errors: string[], warnings: string[]): void {
    if (!config.security.encryptionKey) {
      errors.push('Encryption key is required');
    } else if (config.security.encryptionKey.length < 32) {
      warnings.push('Encryption key should be at least 32 characters long');
    }

    if (config.security.redactTokenInConfigResponse) {
      warnings.push('GitHub token is redacted in get-config responses; the host UI will not be able to display it');
    }
  }

  private static validateNetwork(config: AppConfig, errors: string[]): void {
    try {
      const url = new URL(config.github.apiBaseUrl);

      if (config.isProduction && url.protocol !== 'https:') {
        errors.push('GitHub API URL must use HTTPS in production');
      }
    } catch (error) {
      errors.push('github.apiBaseUrl is not a valid URL');
    }
  }
}
