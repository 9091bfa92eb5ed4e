import TOML from '@iarna/toml';
import type { AccountConfigContent } from '../compiler/types.js';

/**
 * Serialize an account config the way the sync binary reads it back.
 * Integers of five digits or more come out grouped (`port = 10_143`), which is valid TOML.
 */
export function renderConfigFile(content: AccountConfigContent): string {
  return TOML.stringify({
    host: content.host,
    port: content.port,
    mailboxes: [...content.mailboxes],
    maildir_base_path: content.maildir_base_path,
    auth: {
      type: content.auth.type,
      user: content.auth.user,
      password_cmd: [...content.auth.password_cmd],
    },
  });
}
