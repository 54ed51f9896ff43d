/**
 * Environment handed to child processes: the parent's, minus anything that
 * looks like a credential.
 */

const SECRET_NAME = /(API_?KEY|TOKEN|SECRET|PASSWORD|PASSWD|CREDENTIAL|PRIVATE_?KEY|SESSION_?KEY)/i;

export function isSecretName(name: string): boolean {
  return SECRET_NAME.test(name);
}

/**
 * Copy `env` without secret-looking variables. Names in `passEnv` are kept
 * even when they look secret.
 */
export function sanitizeEnv(
  env: Record<string, string | undefined>,
  passEnv: readonly string[] = []
): Record<string, string> {
  const keep = new Set(passEnv);
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (isSecretName(name) && !keep.has(name)) continue;
    result[name] = value;
  }
  return result;
}
