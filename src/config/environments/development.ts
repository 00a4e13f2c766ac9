import type { AppConfigOverrides } from '../index';

export const developmentConfig: AppConfigOverrides = {
  logging: {
    level: 'debug',
  },

  database: {
    path: './data/dashboard-dev.db',
    busyTimeout: 30000,
  },
};
