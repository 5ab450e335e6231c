/**
 * Service Provider Interface (SPI) definitions
 *
 * Capabilities injected once at startup: the terminal prompter, the hardware
 * key interaction callbacks, and the FIDO2 authenticator backend.
 */

// ===== Terminal interaction =====

/**
 * Interactive prompts. The terminal implementation lives in @gp-okta/client;
 * tests use a scripted one.
 */
export interface Prompter {
  /** Ask for a visible value (username, SMS code) */
  text(message: string): Promise<string>;
  /** Ask for a hidden value (password, PIN) */
  secret(message: string): Promise<string>;
  /** Yes/no question, defaulting to no */
  confirm(message: string): Promise<boolean>;
  /** Informational line for the user */
  info(message: string): void;
  /** Stop reading the terminal before the VPN client inherits it */
  close?(): void;
}

// ===== Hardware authenticator =====

/**
 * Callbacks an authenticator backend uses while talking to a security key.
 */
export interface UserInteraction {
  /** The authenticator is waiting for a touch */
  promptPresence(): void;
  /** PIN for the authenticator, or undefined to cancel */
  requestPin(permissions: number, rpId: string): Promise<string | undefined>;
  /** Whether user verification may proceed */
  requestUserVerification(permissions: number, rpId: string): Promise<boolean>;
}

export interface Fido2Device {
  /** Human-readable device label (product name, hidraw path) */
  readonly descriptor: string;
}

export interface AllowedCredential {
  type: 'public-key';
  id: Uint8Array;
}

export interface AssertionRequest {
  /** Origin the client data is bound to, e.g. https://example.okta.com */
  origin: string;
  rpId: string;
  challenge: Uint8Array;
  allowCredentials: AllowedCredential[];
}

/**
 * Signed assertion returned by an authenticator.
 *
 * Binary fields use unpadded base64url, the canonical WebAuthn JSON encoding.
 */
export interface AuthenticatorAssertion {
  credentialId: string;
  authenticatorData: string;
  clientDataJSON: string;
  signature: string;
  userHandle?: string;
}

/**
 * FIDO2 authenticator backend
 *
 * Implementations wrap a CTAP2 library. Loaded by loadFido2Backend() from the
 * package named in `webauthn.backend`.
 */
export interface Fido2Backend {
  readonly id: string;
  listDevices(): Promise<Fido2Device[]>;
  getAssertion(
    device: Fido2Device,
    request: AssertionRequest,
    interaction: UserInteraction
  ): Promise<AuthenticatorAssertion>;
}
