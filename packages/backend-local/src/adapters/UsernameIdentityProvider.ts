import { USERNAME, type IdentityProvider } from "../core.js";

/**
 * Takes the username from the `username` query parameter of the WebSocket
 * handshake. There is no credential check: this is the local development
 * identity, not authentication.
 */
export class UsernameIdentityProvider implements IdentityProvider {
  async resolve(credentials: URLSearchParams): Promise<string | undefined> {
    const username = credentials.get("username")?.trim();
    if (!username || !USERNAME.test(username)) {
      return undefined;
    }
    return username;
  }
}
