/**
 * Security-relevant events written as JSON lines next to the request log
 */
export type AuditEvent =
  | 'user_login_success'
  | 'user_login_failure'
  | 'user_logout'
  | 'refresh_token_replay'
  | 'signing_key_rotated';

export function logAuditEvent(event: AuditEvent, details: Record<string, string | number | undefined>): void {
  console.log(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      event,
      ...details,
    })
  );
}
