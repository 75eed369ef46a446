/**
 * Logical provider keys. The Provider Registry holds exactly one entry per member.
 */
export const SERVICE_NAMES = ['google', 'yandex', 'mail', 'vk'] as const;
export type ServiceName = (typeof SERVICE_NAMES)[number];

/**
 * App availability. Only `enable` apps are resolvable by service.
 */
export const APP_STATUSES = ['enable', 'disable'] as const;
export type AppStatus = (typeof APP_STATUSES)[number];

/**
 * A registered OAuth client for one provider
 */
export type App = {
  /** Provider client identifier, also the primary key */
  id: string;
  /**
   * Provider key as stored. Rows may outlive a registry entry, so this is only
   * narrowed to ServiceName when a client configuration is resolved.
   */
  service: string;
  /** Client secret */
  password: string;
  callbackURL: string;
  expiry: Date | null;
  createdAt: Date;
  status: AppStatus;
};

/**
 * Input accepted by App registration
 */
export type NewApp = {
  id: string;
  service: ServiceName;
  password: string;
  callbackURL: string;
  expiry?: Date | null;
  status?: AppStatus;
};

/**
 * Single-use correlation record binding an OAuth `state` to a user and service
 */
export type Exchange = {
  /** Opaque random identifier, sent to the provider as `state` */
  id: string;
  service: ServiceName;
  userID: number;
  /** PKCE verifier, null when the provider does not take PKCE */
  codeVerifier: string | null;
  createdAt: Date;
  expiresAt: Date;
};

/**
 * Delegated grant persisted per `(userID, service)`
 */
export type Token = {
  userID: number;
  service: ServiceName;
  tokenType: string;
  accessToken: string;
  /** Empty when the provider issued none */
  refreshToken: string;
  /** Null when the provider reported no lifetime */
  expiry: Date | null;
  createdAt: Date;
};

/**
 * How client credentials travel to the token endpoint
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post';

/**
 * Provider-specific capabilities and requirements
 */
export type ProviderQuirks = {
  /** Whether authorization requests carry a PKCE S256 challenge */
  requiresPKCE: boolean;
  /** Whether the provider issues refresh tokens */
  supportsRefreshTokens: boolean;
  clientAuthMethod: ClientAuthMethod;
};

/**
 * Fixed OAuth2 endpoint pair of a provider
 */
export type ProviderEndpoint = {
  authURL: string;
  tokenURL: string;
};

/**
 * Ready-to-use OAuth2 client configuration for one service
 */
export type ClientConfig = {
  service: ServiceName;
  clientId: string;
  clientSecret: string;
  scopes: string[];
  redirectURL: string;
  endpoint: ProviderEndpoint;
  quirks: ProviderQuirks;
};

/**
 * Token material returned by a provider token endpoint, after normalization
 */
export type TokenGrant = {
  tokenType: string;
  accessToken: string;
  /** Empty when the provider did not send one */
  refreshToken: string;
  expiry: Date | null;
};

/**
 * Closed set of error codes surfaced by the broker
 */
export type DelegationErrorCode =
  | 'not_found'
  | 'already_exists'
  | 'service_unsupported'
  | 'invalid_status'
  | 'invalid_request'
  | 'internal_error';

/**
 * Standardized error shape thrown by every broker operation
 */
export type DelegationError = {
  /** HTTP status the boundary should answer with */
  statusCode: number;
  error: DelegationErrorCode;
  /** Human-readable error description, never driver or provider detail */
  error_description?: string;
  /** Service involved, when known */
  service?: string;
  /** Operation stage that failed */
  stage?: string;
};

/**
 * Per-call options accepted by operations that reach a provider
 */
export type CallOptions = {
  /** Aborts pending provider calls and unwinds the operation */
  signal?: AbortSignal;
};
