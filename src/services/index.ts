/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to storage.
 * All licensing rules live here.
 */

// Feature catalog and license key codec
export {
  TIER_FEATURES,
  UNLIMITED,
  resolveFeatures,
  hasFeature,
  getLimit,
  isUnlimited,
} from './feature-catalog.js';
export {
  DEFAULT_LICENSE_KEY_PREFIX,
  generateLicenseKey,
  validateLicenseKeyFormat,
  normalizeLicenseKey,
  maskLicenseKey,
} from './license-key.js';

// Subscription aggregate and device registry
export * from './subscription.aggregate.js';
export * from './device-registry.js';

// Tokens
export type { SigningKeyPair, KeyPairPaths } from './key-store.js';
export { loadOrCreateKeyPair, generateSigningKeyPair } from './key-store.js';
export type {
  LicenseTokenAuthority,
  LicenseTokenAuthorityOptions,
} from './token.service.js';
export { createLicenseTokenAuthority } from './token.service.js';
export type {
  AccessTokenAuthority,
  AccessTokenAuthorityOptions,
} from './access-token.service.js';
export {
  createAccessTokenAuthority,
  hashApiKey,
  verifyOperatorApiKey,
} from './access-token.service.js';

// Storage
export type { LicenseRepository, LicenseRepositoryTx } from './license.repository.js';
export type { InMemoryLicenseRepository } from './license.memory.js';
export { createInMemoryLicenseRepository } from './license.memory.js';
export { createLicenseRepositoryDb } from './license.db.js';

// LicenseService
export type { LicenseService } from './license.service.js';
export { createLicenseService } from './license.service.js';

// SubscriptionService
export type { SubscriptionService } from './subscription.service.js';
export { createSubscriptionService } from './subscription.service.js';
