/**
 * src/modules/accounts/account.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for every accounts endpoint.
 *
 * RULES:
 * - No DB access, no business rules.
 * - Bodies are validated with Zod safeParse; failures answer 400 with the first
 *   issue's message.
 * - Role gates go through requireUser / requireModerator / requireAdmin.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';

import { AppError } from '../../shared/http/errors';
import { requireAdmin, requireModerator, requireUser } from '../../shared/http/require-user';
import {
  activateSchema,
  changeGroupSchema,
  changePasswordSchema,
  emailOnlySchema,
  loginSchema,
  refreshTokenSchema,
  registerSchema,
  resetPasswordCompleteSchema,
  userIdParamsSchema,
} from './account.schemas';
import type { AccountService } from './account.service';
import type { RequestMeta } from './account.types';

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw AppError.validationError(first?.message ?? 'Invalid request body.', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
  }
  return parsed.data;
}

function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.requestContext.ip,
    userAgent: req.requestContext.userAgent,
  };
}

export class AccountController {
  constructor(private readonly accountService: AccountService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(registerSchema, req.body);

    const result = await this.accountService.register({ ...requestMeta(req), ...body });

    return reply.status(201).send(result);
  }

  async activate(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(activateSchema, req.body);

    const result = await this.accountService.activate({ ...requestMeta(req), ...body });

    return reply.status(200).send(result);
  }

  async resendActivation(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(emailOnlySchema, req.body);

    const result = await this.accountService.resendActivation({ ...requestMeta(req), ...body });

    return reply.status(200).send(result);
  }

  async requestPasswordReset(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(emailOnlySchema, req.body);

    const result = await this.accountService.requestPasswordReset({ ...requestMeta(req), ...body });

    return reply.status(200).send(result);
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(resetPasswordCompleteSchema, req.body);

    const result = await this.accountService.resetPassword({ ...requestMeta(req), ...body });

    return reply.status(200).send(result);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(loginSchema, req.body);

    const result = await this.accountService.login({ ...requestMeta(req), ...body });

    return reply.status(201).send(result);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(refreshTokenSchema, req.body);

    const result = await this.accountService.refresh({
      ...requestMeta(req),
      refreshToken: body.refresh_token,
    });

    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(refreshTokenSchema, req.body);

    const result = await this.accountService.logout({
      ...requestMeta(req),
      refreshToken: body.refresh_token,
    });

    return reply.status(200).send(result);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);

    const result = await this.accountService.getAccount(user.userId);

    return reply.status(200).send(result);
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);
    const body = parseOrThrow(changePasswordSchema, req.body);

    const result = await this.accountService.changePassword({
      ...requestMeta(req),
      userId: user.userId,
      oldPassword: body.old_password,
      newPassword: body.new_password,
    });

    return reply.status(200).send(result);
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    requireModerator(req);
    const params = parseOrThrow(userIdParamsSchema, req.params);

    const result = await this.accountService.getAccount(params.userId);

    return reply.status(200).send(result);
  }

  async adminActivateUser(req: FastifyRequest, reply: FastifyReply) {
    const admin = requireAdmin(req);
    const params = parseOrThrow(userIdParamsSchema, req.params);

    const result = await this.accountService.adminActivateUser({
      ...requestMeta(req),
      actorUserId: admin.userId,
      targetUserId: params.userId,
    });

    return reply.status(200).send(result);
  }

  async adminChangeGroup(req: FastifyRequest, reply: FastifyReply) {
    const admin = requireAdmin(req);
    const params = parseOrThrow(userIdParamsSchema, req.params);
    const body = parseOrThrow(changeGroupSchema, req.body);

    const result = await this.accountService.adminChangeGroup({
      ...requestMeta(req),
      actorUserId: admin.userId,
      targetUserId: params.userId,
      group: body.group,
    });

    return reply.status(200).send(result);
  }
}
