import { beforeEach } from 'vitest';
import { logger } from './logging/index.js';

// Tests share the module-level logger state
beforeEach(() => {
  logger.reset();
});
