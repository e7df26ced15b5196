/**
 * Last-resort handlers: log and exit 1
 */
import { logger } from './logger.js';

export interface CrashHandlers {
    uncaughtException: (error: Error) => void;
    unhandledRejection: (reason: unknown) => void;
}

export function createCrashHandlers(exit: (code: number) => void): CrashHandlers {
    return {
        uncaughtException: (error) => {
            logger.error('Uncaught exception', error);
            exit(1);
        },
        unhandledRejection: (reason) => {
            logger.error('Unhandled rejection', reason);
            exit(1);
        },
    };
}

export function installCrashHandlers(): void {
    const handlers = createCrashHandlers((code) => process.exit(code));
    process.on('uncaughtException', handlers.uncaughtException);
    process.on('unhandledRejection', handlers.unhandledRejection);
}
