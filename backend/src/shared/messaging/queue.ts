/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "an account email must go out" from how it is delivered.
 * - Flows enqueue messages; the transport (SMTP relay, SES, a worker) is chosen in di.ts.
 *
 * RULES:
 * - Messages are discriminated unions on `type` and must be JSON-serializable.
 * - Raw activation/reset tokens may travel here (they end up in the email link and are
 *   never stored). Password hashes and refresh/access tokens never do.
 */

// ── Message types ─────────────────────────────────────────────

export type ActivationEmailMessage = {
  type: 'accounts.activation-email';
  userId: number;
  email: string;
  /** Raw activation token, only for the link. */
  activationToken: string;
  /** `{PUBLIC_APP_URL}/activate?email=..&token=..` */
  activationLink: string;
};

export type ActivationCompleteEmailMessage = {
  type: 'accounts.activation-complete-email';
  userId: number;
  email: string;
  loginLink: string;
};

export type PasswordResetEmailMessage = {
  type: 'accounts.password-reset-email';
  userId: number;
  email: string;
  /** Raw reset token, only for the link. */
  resetToken: string;
  /** `{PUBLIC_APP_URL}/reset-password?email=..&token=..` */
  resetLink: string;
};

export type PasswordResetCompleteEmailMessage = {
  type: 'accounts.password-reset-complete-email';
  userId: number;
  email: string;
  loginLink: string;
};

export type QueueMessage =
  | ActivationEmailMessage
  | ActivationCompleteEmailMessage
  | PasswordResetEmailMessage
  | PasswordResetCompleteEmailMessage;

export type QueueMessageType = QueueMessage['type'];

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
