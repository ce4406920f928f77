import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  /** Logs a fatal error and terminates the run with exit code 1. */
  static handle(error: unknown): never {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        context: error.context,
        ...(error.isOperational ? {} : { stack: error.stack }),
      });
      console.error(`\n❌ ${error.message}`);
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      console.error(`\n❌ Unexpected error: ${error.message}`);
    } else {
      Logger.error('Unknown error occurred', { error });
      console.error('\n❌ Unknown error occurred');
    }

    process.exit(1);
  }

  static setupGlobalHandlers(): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason });
      process.exit(1);
    });

    process.on('SIGTERM', () => {
      Logger.info('SIGTERM received, shutting down');
      process.exit(143);
    });

    process.on('SIGINT', () => {
      Logger.info('SIGINT received, shutting down');
      process.exit(130);
    });
  }
}
