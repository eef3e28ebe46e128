import {Server} from 'node:http';
import {Logger} from '../logger';

type Exit = (code: number) => void;

const exitProcess: Exit = code => process.exit(code);

/**
 * Listener for server errors such as EADDRINUSE: log and stop the process.
 */
export const serverErrorHandler = (log: Logger, exit: Exit = exitProcess) => (error: Error): void => {
  log.error('API server failed', error);
  exit(1);
};

export const shutdownHandler = (server: Server, signal: string, log: Logger, exit: Exit = exitProcess) => (): void => {
  log.info(`Received ${signal}, shutting down`);
  server.close(error => {
    if (error) {
      log.error('Error while closing server', error);
      exit(1);
      return;
    }
    exit(0);
  });
};
