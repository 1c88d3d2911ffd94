/**
 * In-memory License Repository
 *
 * For development and tests. Units of work are serialized per lock key
 * with an in-process mutex and rolled back by restoring before-images.
 */

import { randomUUID } from 'node:crypto';

import type {
  Device,
  NewDevice,
  NewSubscription,
  Subscription,
} from '../types/index.js';
import { RepositoryError } from '../types/index.js';
import type { KeyedLock } from '../lib/lock.js';
import { createInProcessLock } from '../lib/lock.js';

import type { LicenseRepository, LicenseRepositoryTx } from './license.repository.js';

type StoredSubscription = Omit<Subscription, 'devices'>;

type Undo = () => void;

export interface InMemoryLicenseRepository extends LicenseRepository {
  /** Number of stored subscriptions */
  size(): number;
  clear(): void;
}

export function createInMemoryLicenseRepository(
  options: { lock?: KeyedLock } = {}
): InMemoryLicenseRepository {
  const lock = options.lock ?? createInProcessLock();
  const subscriptions = new Map<string, StoredSubscription>();
  const devices = new Map<string, Device>();

  function hydrate(stored: StoredSubscription): Subscription {
    const owned = [...devices.values()]
      .filter((device) => device.subscriptionId === stored.id)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return structuredClone({ ...stored, devices: owned });
  }

  function strip(subscription: Subscription): StoredSubscription {
    return structuredClone({
      id: subscription.id,
      customerId: subscription.customerId,
      licenseKey: subscription.licenseKey,
      tier: subscription.tier,
      status: subscription.status,
      features: subscription.features,
      maxDevices: subscription.maxDevices,
      startsAt: subscription.startsAt,
      expiresAt: subscription.expiresAt,
      gracePeriodDays: subscription.gracePeriodDays,
      autoRenew: subscription.autoRenew,
      metadata: subscription.metadata,
      createdAt: subscription.createdAt,
      updatedAt: subscription.updatedAt,
    });
  }

  /**
   * Operations, optionally recording how to undo each write
   */
  function operations(journal: Undo[] | null): LicenseRepositoryTx {
    const record = (undo: Undo) => {
      journal?.push(undo);
    };

    return {
      async getSubscriptionByLicenseKey(licenseKey: string) {
        for (const stored of subscriptions.values()) {
          if (stored.licenseKey === licenseKey) {
            return hydrate(stored);
          }
        }
        return null;
      },

      async getSubscriptionById(subscriptionId: string) {
        const stored = subscriptions.get(subscriptionId);
        return stored === undefined ? null : hydrate(stored);
      },

      async createSubscription(input: NewSubscription) {
        for (const stored of subscriptions.values()) {
          if (stored.licenseKey === input.licenseKey) {
            throw new RepositoryError('License key already exists', {
              entity: 'subscription',
              operation: 'create',
            });
          }
        }
        const id = randomUUID();
        const created: StoredSubscription = structuredClone({ ...input, id });
        subscriptions.set(id, created);
        record(() => subscriptions.delete(id));
        return hydrate(created);
      },

      async updateSubscription(subscription: Subscription) {
        const previous = subscriptions.get(subscription.id);
        if (previous === undefined) {
          throw new RepositoryError(`Subscription ${subscription.id} not found`, {
            entity: 'subscription',
            operation: 'update',
          });
        }
        const next = strip(subscription);
        subscriptions.set(subscription.id, next);
        record(() => subscriptions.set(subscription.id, previous));
        return hydrate(next);
      },

      async createDevice(input: NewDevice) {
        if (!subscriptions.has(input.subscriptionId)) {
          throw new RepositoryError(`Subscription ${input.subscriptionId} not found`, {
            entity: 'device',
            operation: 'create',
          });
        }
        for (const device of devices.values()) {
          if (
            device.subscriptionId === input.subscriptionId &&
            device.deviceId === input.deviceId
          ) {
            throw new RepositoryError('Device already bound to subscription', {
              entity: 'device',
              operation: 'create',
            });
          }
        }
        const device: Device = structuredClone({ ...input, id: randomUUID() });
        devices.set(device.id, device);
        record(() => devices.delete(device.id));
        return structuredClone(device);
      },

      async updateDevice(device: Device) {
        const previous = devices.get(device.id);
        if (previous === undefined) {
          throw new RepositoryError(`Device ${device.id} not found`, {
            entity: 'device',
            operation: 'update',
          });
        }
        devices.set(device.id, structuredClone(device));
        record(() => devices.set(device.id, previous));
        return structuredClone(device);
      },

      async listExpiringSubscriptions(now: Date, before: Date) {
        return [...subscriptions.values()]
          .filter(
            (stored) =>
              (stored.status === 'active' || stored.status === 'expired') &&
              stored.expiresAt !== null &&
              stored.expiresAt.getTime() > now.getTime() &&
              stored.expiresAt.getTime() <= before.getTime()
          )
          .sort(
            (a, b) => (a.expiresAt?.getTime() ?? 0) - (b.expiresAt?.getTime() ?? 0)
          )
          .map(hydrate);
      },
    };
  }

  const direct = operations(null);

  return {
    ...direct,

    async transaction<T>(
      lockKey: string,
      work: (tx: LicenseRepositoryTx) => Promise<T>
    ): Promise<T> {
      return lock.withLock(lockKey, async () => {
        const journal: Undo[] = [];
        try {
          return await work(operations(journal));
        } catch (err) {
          for (const undo of journal.reverse()) {
            undo();
          }
          throw err;
        }
      });
    },

    size() {
      return subscriptions.size;
    },

    clear() {
      subscriptions.clear();
      devices.clear();
    },
  };
}
