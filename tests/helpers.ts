// =============================================================================
// GAZETTE - Integration Test Helpers
//
// Starts the Express app in-process on an ephemeral port against an
// in-memory store. Requests go over real HTTP with fetch.
// =============================================================================

import { Server } from 'http';
import { createApp } from '../src/app';
import { signAccessToken } from '../src/middleware/authenticate';
import { IMailer } from '../src/services/password-reset';
import { User } from '../src/types/publishing';
import { RecordingMailer } from './support/fixtures';
import { MemoryPublishingStore } from './support/memory-store';

export interface TestServer {
  store: MemoryPublishingStore;
  mailer: IMailer;
  baseUrl: string;
  close: () => Promise<void>;
}

export interface TestServerOptions {
  store?: MemoryPublishingStore;
  mailer?: IMailer;
  databaseUp?: boolean;
}

export async function startServer(options: TestServerOptions = {}): Promise<TestServer> {
  const store = options.store ?? new MemoryPublishingStore();
  const mailer = options.mailer ?? new RecordingMailer();
  const databaseUp = options.databaseUp ?? true;

  const app = createApp({
    store,
    mailer,
    checkDatabase: async () => {
      if (!databaseUp) throw new Error('connection refused');
    },
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server did not bind a TCP port');
  }

  return {
    store,
    mailer,
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** Bearer token for a seeded user, bypassing the login route. */
export function tokenFor(user: User): string {
  return signAccessToken(user);
}

/**
 * Make an API request. Returns the raw Response for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  path: string,
  body?: unknown,
  token?: string,
): Promise<Response> {
  const headers: Record<string, string> = {};

  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/**
 * Parse JSON response with error context.
 */
export async function json(res: Response): Promise<any> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}
