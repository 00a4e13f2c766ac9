import type { AppConfigOverrides } from '../index';

export const testConfig: AppConfigOverrides = {
  // Minimal logging during tests
  logging: {
    level: 'error',
  },

  github: {
    requestTimeout: 2000,
  },

  database: {
    path: ':memory:', // In-memory database for tests
    busyTimeout: 5000,
  },
};
