/**
 * Turns handshake credentials into a validated username before the
 * WebSocket connection is accepted. Returns undefined to refuse it.
 */
export interface IdentityProvider {
  resolve(credentials: URLSearchParams): Promise<string | undefined>;
}
