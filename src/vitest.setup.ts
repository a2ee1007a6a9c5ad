import { beforeEach } from 'vitest';
import { setConfig } from './config/index.js';
import { resetLogger } from './utils/logger.js';

// Silent logs and default settings for every test
beforeEach(() => {
  setConfig({ logLevel: 'silent', logFormat: 'json' });
  resetLogger();
});
