import dotenv from 'dotenv';
import { logger } from '../utils/logger';
import { developmentConfig } from './environments/development';
import { productionConfig } from './environments/production';
import { testConfig } from './environments/test';

// Load environment variables
dotenv.config();

export const DEFAULT_ENCRYPTION_KEY = 'dashboard-development-key-change-in-production';

export interface AppConfig {
  // Environment
  nodeEnv: string;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;

  // Plugin identity and storage layout
  plugin: {
    name: string;
    version: string;
    settingsKey: string;
    settingsVersion: string;
  };

  // GitHub Configuration
  github: {
    apiBaseUrl: string;
    requestTimeout: number;
    userAgent: string;
  };

  // Plugin storage
  database: {
    path: string;
    busyTimeout: number;
  };

  // Logging Configuration
  logging: {
    level: string;
    toFile: boolean;
    filePath: string;
  };

  // Security Configuration
  security: {
    encryptionKey: string;
    redactTokenInConfigResponse: boolean;
  };
}

export type AppConfigOverrides = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

const environmentOverrides: Record<string, AppConfigOverrides> = {
  development: developmentConfig,
  production: productionConfig,
  test: testConfig,
};

export class ConfigManager {
  private config: AppConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.applyOverrides(this.loadConfiguration(env), env);
  }

  private loadConfiguration(env: NodeJS.ProcessEnv): AppConfig {
    const nodeEnv = env.NODE_ENV || 'development';

    return {
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',

      plugin: {
        name: 'repo-dashboard',
        version: '1.0.0',
        settingsKey: 'dashboard_settings',
        settingsVersion: '1.0.0',
      },

      github: {
        apiBaseUrl: env.GITHUB_API_URL || 'https://api.github.com',
        requestTimeout: parseInt(env.GITHUB_REQUEST_TIMEOUT || '30000', 10),
        userAgent: env.GITHUB_USER_AGENT || 'repo-dashboard-plugin/1.0',
      },

      database: {
        path: env.DATABASE_PATH || './data/dashboard.db',
        busyTimeout: parseInt(env.DATABASE_BUSY_TIMEOUT || '30000', 10),
      },

      logging: {
        level: (env.LOG_LEVEL || 'info').toLowerCase(),
        toFile: env.LOG_TO_FILE?.toLowerCase() === 'true',
        filePath: env.LOG_FILE_PATH || './logs',
      },

      security: {
        encryptionKey: env.ENCRYPTION_KEY || DEFAULT_ENCRYPTION_KEY,
        redactTokenInConfigResponse: env.REDACT_CONFIG_TOKEN?.toLowerCase() === 'true',
      },
    };
  }

  /**
   * Environment defaults only fill in values the process environment left unset
   */
  private applyOverrides(base: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
    const overrides = environmentOverrides[base.nodeEnv] ?? {};

    return {
      ...base,
      github: {
        ...base.github,
        ...(env.GITHUB_REQUEST_TIMEOUT ? {} : overrides.github),
      },
      database: {
        ...base.database,
        ...(env.DATABASE_PATH ? {} : overrides.database),
      },
      logging: {
        ...base.logging,
        ...(env.LOG_LEVEL ? {} : overrides.logging),
      },
    };
  }

  public getConfig(): AppConfig {
    return { ...this.config }; // Return a copy to prevent mutations
  }

  public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.config[key];
  }

  public isTest(): boolean {
    return this.config.isTest;
  }

  public logSanitizedConfig(): void {
    logger.info('Application configuration loaded', {
      nodeEnv: this.config.nodeEnv,
      plugin: this.config.plugin,
      github: this.config.github,
      database: this.config.database,
      logging: this.config.logging,
      security: {
        encryptionKey: this.config.security.encryptionKey === DEFAULT_ENCRYPTION_KEY ? '[DEFAULT]' : '[SET]',
        redactTokenInConfigResponse: this.config.security.redactTokenInConfigResponse,
      },
    });
  }
}

// Export singleton instance
export const config = new ConfigManager();
export default config;
