import { getErrorMessage } from '@digestbench/core';
import { createLogger, startServer } from './index.js';

const log = createLogger('Main');

startServer().catch((err: unknown) => {
  log.error(`Failed to start server: ${getErrorMessage(err)}`);
  process.exit(1);
});
