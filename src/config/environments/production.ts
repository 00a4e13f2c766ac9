import type { AppConfigOverrides } from '../index';

export const productionConfig: AppConfigOverrides = {
  logging: {
    level: 'info',
  },

  github: {
    requestTimeout: 20000,
  },

  database: {
    path: './data/dashboard.db',
    busyTimeout: 60000,
  },
};
