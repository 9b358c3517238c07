import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp, readJson } from '../helpers/build-test-app';
import { STRONG_PASSWORD } from '../helpers/account-helpers';
import type { ErrorBody } from '../helpers/account-helpers';
import { Sha256TokenHasher } from '../../src/shared/security/token-hasher';

/**
 * E2E tests for POST /accounts/register.
 */

describe('POST /accounts/register', () => {
  let ctx: Awaited<ReturnType<typeof buildTestApp>>;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('creates an inactive user and queues the activation email', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: '  New.User@Example.com ', password: STRONG_PASSWORD },
    });

    expect(res.statusCode).toBe(201);
    const body = readJson<{ id: number; email: string }>(res);
    expect(body.email).toBe('new.user@example.com');
    expect(Object.keys(body).sort()).toEqual(['email', 'id']);

    const user = await ctx.deps.users.findById(body.id);
    expect(user?.isActive).toBe(false);
    expect(user?.group).toBe('user');

    const [message] = ctx.queue.drainOfType('accounts.activation-email');
    expect(message?.userId).toBe(body.id);
    expect(message?.email).toBe('new.user@example.com');
    expect(message?.activationLink).toBe(
      `http://app.test/activate?email=new.user%40example.com&token=${message?.activationToken}`,
    );
  });

  it('stores only the hash of the activation token, valid for 24 hours', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'hash@example.com', password: STRONG_PASSWORD },
    });
    const { id } = readJson<{ id: number }>(res);
    const [message] = ctx.queue.drainOfType('accounts.activation-email');
    const rawToken = message?.activationToken ?? '';

    const row = await ctx.deps.db
      .selectFrom('activation_tokens')
      .selectAll()
      .where('user_id', '=', id)
      .executeTakeFirstOrThrow();

    expect(row.token_hash).toBe(new Sha256TokenHasher().hash(rawToken));
    expect(row.token_hash).not.toBe(rawToken);
    expect(row.expires_at.getTime() - row.created_at.getTime()).toBe(24 * 60 * 60 * 1000);
  });

  it('stores the password hashed', async () => {
    await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'pw@example.com', password: STRONG_PASSWORD },
    });

    const row = await ctx.deps.db
      .selectFrom('users')
      .select('hashed_password')
      .where('email', '=', 'pw@example.com')
      .executeTakeFirstOrThrow();

    expect(row.hashed_password).not.toBe(STRONG_PASSWORD);
    expect(await ctx.deps.passwordHasher.verify(STRONG_PASSWORD, row.hashed_password)).toBe(true);
  });

  it('409 when the email is taken (case-insensitive)', async () => {
    await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'taken@example.com', password: STRONG_PASSWORD },
    });

    const res = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'TAKEN@example.com', password: STRONG_PASSWORD },
    });

    expect(res.statusCode).toBe(409);
    expect(readJson<ErrorBody>(res)).toEqual({
      detail: 'A user with this email taken@example.com already exists.',
      code: 'CONFLICT',
    });
  });

  it('400 with the first password rule that fails', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'weak@example.com', password: 'weakpass' },
    });

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorBody>(res)).toEqual({
      detail: 'Password must contain at least one uppercase letter.',
      code: 'VALIDATION_ERROR',
    });
    expect(ctx.queue.drain()).toEqual([]);
  });

  it('400 for an invalid or missing email', async () => {
    const invalid = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'not-an-email', password: STRONG_PASSWORD },
    });
    expect(invalid.statusCode).toBe(400);
    expect(readJson<ErrorBody>(invalid).detail).toBe('Enter a valid email address.');

    const missing = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { password: STRONG_PASSWORD },
    });
    expect(missing.statusCode).toBe(400);
    expect(readJson<ErrorBody>(missing).detail).toBe('Email is required.');
  });

  it('400 for a body that is not valid JSON', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      headers: { 'content-type': 'application/json' },
      payload: '{"email":',
    });

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorBody>(res).code).toBe('VALIDATION_ERROR');
  });

  it('500 when the default user group is missing', async () => {
    await ctx.deps.db.deleteFrom('user_groups').where('name', '=', 'user').execute();

    const res = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'nogroup@example.com', password: STRONG_PASSWORD },
    });

    expect(res.statusCode).toBe(500);
    expect(readJson<ErrorBody>(res)).toEqual({
      detail: 'Default user group not found.',
      code: 'INTERNAL',
    });
    expect(ctx.queue.drain()).toEqual([]);
  });

  it('writes a register audit row', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/accounts/register',
      payload: { email: 'audit@example.com', password: STRONG_PASSWORD },
    });
    const { id } = readJson<{ id: number }>(res);

    const rows = await ctx.deps.db
      .selectFrom('audit_events')
      .select(['action', 'user_id'])
      .where('action', '=', 'accounts.register.success')
      .execute();

    expect(rows).toEqual([{ action: 'accounts.register.success', user_id: id }]);
  });
});
