/**
 * Auth module barrel export
 *
 * Credential discovery, PKCE login and token refresh for the OAuth backends.
 */

// Types
export * from "./types";

// Storage
export { AuthFile, CredentialStore, GATEWAY_HOME, DEFAULT_AUTH_PATH } from "./store";
export {
  createDefaultCredentialStore,
  JsonFileSource,
  KeychainSource,
  claudeCodec,
  codexCodec,
  codexKeychainAccount,
  type CredentialCodec,
  type DefaultStoreOptions,
  type SecurityRunner,
} from "./sources";

// Token management
export { TokenManager, type RefreshListener, type TokenManagerOptions } from "./token-manager";

// OAuth
export {
  OAuthFlow,
  buildAuthorizationUrl,
  exchangeCode,
  refreshCredential,
  type LoginOptions,
  type OAuthProfile,
} from "./oauth";
export {
  generatePKCE,
  generateState,
  startCallbackListener,
  getCallbackUrl,
  type PkcePair,
  type CallbackListener,
} from "./server";
export { decodeJwtPayload, extractCodexAccountId } from "./jwt";

// Backend-specific profiles
export {
  anthropicProfile,
  anthropicPasteCodeProfile,
  loginAnthropicPasteCode,
  parsePastedCode,
  type PasteCodeLoginOptions,
} from "./anthropic";
export { codexProfile, loginCodexHeadless, type HeadlessLoginOptions } from "./codex";
