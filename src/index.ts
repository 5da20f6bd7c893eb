#!/usr/bin/env node
import { main } from './cli/main';
import { logger } from './utils/logger';

main(process.argv)
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected failure:', error);
    process.exitCode = 1;
  });
