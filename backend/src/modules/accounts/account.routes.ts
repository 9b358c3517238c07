/**
 * src/modules/accounts/account.routes.ts
 *
 * WHY:
 * - Declares accounts endpoints; routing stays separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Paths are declared without a trailing slash; the server ignores trailing slashes.
 */

import type { FastifyInstance } from 'fastify';
import type { AccountController } from './account.controller';

export function registerAccountRoutes(app: FastifyInstance, controller: AccountController) {
  // Registration & activation
  app.post('/accounts/register', controller.register.bind(controller));
  app.post('/accounts/activate', controller.activate.bind(controller));
  app.post('/accounts/activate/resend', controller.resendActivation.bind(controller));

  // Password reset
  app.post('/accounts/password-reset/request', controller.requestPasswordReset.bind(controller));
  app.post('/accounts/reset-password/complete', controller.resetPassword.bind(controller));

  // Sessions
  app.post('/accounts/login', controller.login.bind(controller));
  app.post('/accounts/refresh', controller.refresh.bind(controller));
  app.post('/accounts/logout', controller.logout.bind(controller));

  // Profile (authenticated)
  app.get('/accounts/me', controller.me.bind(controller));
  app.post('/accounts/change-password', controller.changePassword.bind(controller));

  // Moderation / admin
  app.get('/accounts/users/:userId', controller.getUser.bind(controller));
  app.post('/accounts/admin/users/:userId/activate', controller.adminActivateUser.bind(controller));
  app.post(
    '/accounts/admin/users/:userId/change-group',
    controller.adminChangeGroup.bind(controller),
  );
}
