import { AddressInfo } from 'net';
import { Server } from 'http';

import { Logger } from '../../utils/logger';

import type { Express } from 'express';

/** Logger for tests; pair with `silenceConsole` to keep output clean. */
export function testLogger(): Logger {
  return new Logger({ format: 'json', level: 'debug' });
}

export function silenceConsole(): void {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
}

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/** Listen on an ephemeral localhost port. */
export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server has no TCP address'));
        return;
      }
      const { port }: AddressInfo = address;
      resolve({
        baseUrl: `http://127.0.0.1:${String(port)}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => {
              if (error) fail(error);
              else done();
            });
          }),
      });
    });
  });
}
