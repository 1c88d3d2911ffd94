/**
 * License Repository contract
 *
 * The storage boundary for subscriptions and devices. Adapters wrap every
 * driver error in RepositoryError; the core never inspects them.
 */

import type {
  Device,
  NewDevice,
  NewSubscription,
  Subscription,
} from '../types/index.js';

/**
 * Operations available inside and outside a unit of work
 */
export interface LicenseRepositoryTx {
  /** Subscription with its devices, or null */
  getSubscriptionByLicenseKey(licenseKey: string): Promise<Subscription | null>;
  getSubscriptionById(subscriptionId: string): Promise<Subscription | null>;
  createSubscription(subscription: NewSubscription): Promise<Subscription>;
  /** Persists subscription fields only; devices are written individually */
  updateSubscription(subscription: Subscription): Promise<Subscription>;
  createDevice(device: NewDevice): Promise<Device>;
  updateDevice(device: Device): Promise<Device>;
  /** Active (or cached 'expired') subscriptions with now < expiresAt <= before, soonest first */
  listExpiringSubscriptions(now: Date, before: Date): Promise<Subscription[]>;
}

export interface LicenseRepository extends LicenseRepositoryTx {
  /**
   * Run `work` serialized against every other unit of work on the same
   * lock key. Writes made through `tx` commit together, or are undone
   * when `work` throws.
   */
  transaction<T>(
    lockKey: string,
    work: (tx: LicenseRepositoryTx) => Promise<T>
  ): Promise<T>;
}
