import type { FastifyInstance } from 'fastify';
import { expect } from 'vitest';

import type { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { readJson } from './build-test-app';

export type TokenPair = {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
};

export type ErrorBody = { detail: string; code: string };

export const STRONG_PASSWORD = 'Str0ng!Pass';

export function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}

/** Registers an account and returns its id plus the raw activation token from the queue. */
export async function registerUser(
  app: FastifyInstance,
  queue: InMemQueue,
  email: string,
  password = STRONG_PASSWORD,
): Promise<{ id: number; activationToken: string }> {
  const res = await app.inject({
    method: 'POST',
    url: '/accounts/register',
    payload: { email, password },
  });
  expect(res.statusCode).toBe(201);

  const { id } = readJson<{ id: number }>(res);
  const [message] = queue.drainOfType('accounts.activation-email');
  if (!message) throw new Error(`no activation email queued for ${email}`);

  return { id, activationToken: message.activationToken };
}

export async function login(
  app: FastifyInstance,
  email: string,
  password = STRONG_PASSWORD,
): Promise<TokenPair> {
  const res = await app.inject({
    method: 'POST',
    url: '/accounts/login',
    payload: { email, password },
  });
  expect(res.statusCode).toBe(201);

  return readJson<TokenPair>(res);
}

/** register -> activate -> login */
export async function createActiveUser(
  app: FastifyInstance,
  queue: InMemQueue,
  email: string,
  password = STRONG_PASSWORD,
): Promise<{ id: number; tokens: TokenPair }> {
  const { id, activationToken } = await registerUser(app, queue, email, password);

  const activated = await app.inject({
    method: 'POST',
    url: '/accounts/activate',
    payload: { email, token: activationToken },
  });
  expect(activated.statusCode).toBe(200);
  queue.drain();

  return { id, tokens: await login(app, email, password) };
}
