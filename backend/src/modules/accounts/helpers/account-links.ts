/**
 * backend/src/modules/accounts/helpers/account-links.ts
 *
 * Links embedded in account emails. They point at the web client
 * (PUBLIC_APP_URL), which posts email + token back to the API.
 */

function joinUrl(base: string, path: string, query?: Record<string, string>): string {
  const trimmed = base.replace(/\/+$/, '');
  const qs = query ? `?${new URLSearchParams(query).toString()}` : '';
  return `${trimmed}${path}${qs}`;
}

export function buildActivationLink(base: string, email: string, token: string): string {
  return joinUrl(base, '/activate', { email, token });
}

export function buildPasswordResetLink(base: string, email: string, token: string): string {
  return joinUrl(base, '/reset-password', { email, token });
}

export function buildLoginLink(base: string): string {
  return joinUrl(base, '/login');
}
