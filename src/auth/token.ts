import * as fs from 'fs';
import { getLogger } from '@fluidware-it/saddlebag';
import { errorMessage } from '../client/errors';

// Keychain storage lives outside this tool; headless setups point
// SOCORRO_API_TOKEN_PATH at a file holding the token. The token must carry no
// permissions so the server never returns protected data.
export function readToken(tokenPath: string | undefined): string | undefined {
  if (!tokenPath) return undefined;

  let content: string;
  try {
    content = fs.readFileSync(tokenPath, 'utf8');
  } catch (e) {
    getLogger().warn(`Could not read API token from ${tokenPath}: ${errorMessage(e)}`);
    return undefined;
  }

  const token = content.trim();
  return token === '' ? undefined : token;
}
