import * as os from 'node:os';

/**
 * `user@host` of the current process, recorded as the author of secrets and
 * commits.
 */
export function currentIdentity(): { username: string; hostname: string; label: string } {
  let username: string;
  try {
    username = os.userInfo().username;
  } catch {
    username = process.env['USER'] || process.env['USERNAME'] || 'unknown';
  }
  const hostname = os.hostname();
  return { username, hostname, label: `${username}@${hostname}` };
}
