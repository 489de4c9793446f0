import { logger } from './src/utils/logger';

// Diagnostics go to stderr; keep test output to assertion failures
logger.setLevel('silent');
