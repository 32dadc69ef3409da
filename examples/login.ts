// examples/login.ts
//
// Log in once, then print the current user's profile.
// Requires PKCE_AUTH_CLIENT_ID and PKCE_AUTH_SCOPES (see .env.example).

import dotenv from 'dotenv';
import { PKCEAuthSDK, configFromEnv, validateConfigSafe } from '../src';

dotenv.config();

async function main(): Promise<void> {
  const env = configFromEnv();
  const checked = validateConfigSafe({ provider: 'spotify', ...env });

  if (!checked.success) {
    console.error('Invalid configuration:\n  ' + checked.errors.join('\n  '));
    process.exitCode = 1;
    return;
  }

  const sdk = await PKCEAuthSDK.init(checked.data);
  sdk.onStateChange(({ from, to }) => console.log(`[auth] ${from} -> ${to}`));

  process.once('SIGINT', () => sdk.cancel('Interrupted'));

  try {
    const client = await sdk.authenticate();
    console.log('Authenticated with scopes:', client.scopes.join(', '));

    const me = await client.get<{ id: string; display_name?: string }>('/me');
    console.log(`Logged in as ${me.data.display_name ?? me.data.id}`);
  } finally {
    sdk.destroy();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
