export * from './app-constants';

export const ENV_KEYS = {
  DETECTOR: 'MV_PEOPLE_DETECTOR',
  DETECTOR_TIMEOUT_MS: 'MV_PEOPLE_DETECTOR_TIMEOUT_MS',
  WORKERS: 'MV_PEOPLE_WORKERS',
  LOG_LEVEL: 'MV_PEOPLE_LOG_LEVEL',
} as const;
