import { RCONClient } from "../rcon/client";
import type { RCONConfig } from "../rcon/types";

/**
 * Connects and authenticates a session, hands it to `fn`, and closes it
 * whichever way `fn` exits.
 */
export async function withRCONSession<T>(
  config: RCONConfig,
  fn: (client: RCONClient) => Promise<T>
): Promise<T> {
  const client = new RCONClient(config);
  try {
    await client.connect();
    await client.authenticate();
    return await fn(client);
  } finally {
    client.close();
  }
}
