#!/usr/bin/env node

import { createCLI } from './cli/commands.js';
import { ErrorHandler } from './utils/errorHandler.js';
import { Logger } from './utils/logger.js';
import { validateEnvironment } from './config/index.js';

async function main(): Promise<void> {
  ErrorHandler.setupGlobalHandlers();

  try {
    const missingVars = validateEnvironment();
    if (missingVars.length > 0) {
      Logger.error('Missing required environment variables', { missing: missingVars });
      console.error('\n❌ Missing required environment variables:');
      missingVars.forEach((envVar) => console.error(`   - ${envVar}`));
      console.error('\nPlease check your .env file or environment setup.');
      process.exit(1);
    }

    const program = createCLI();
    await program.parseAsync();
  } catch (error) {
    ErrorHandler.handle(error);
  }
}

void main();
