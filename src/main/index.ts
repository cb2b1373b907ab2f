#!/usr/bin/env node
import { main } from './cli/run';
import { logger } from './utils/logger';
import { EXIT_CODES } from '../shared/constants';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected error:', error);
    process.exitCode = EXIT_CODES.EXCHANGE_FAILED;
  });
