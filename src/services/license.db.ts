/**
 * License Repository - Supabase adapter
 *
 * Tables: subscriptions, devices (see supabase/migrations).
 *
 * PostgREST offers no multi-statement transactions, so a unit of work
 * holds a per-subscription lock and journals each write. When the work
 * throws, the journal is replayed in reverse to restore the before-images.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type {
  Device,
  NewDevice,
  NewSubscription,
  Subscription,
} from '../types/index.js';
import {
  RepositoryError,
  SUBSCRIPTION_STATUSES,
  SUBSCRIPTION_TIERS,
} from '../types/index.js';
import type { KeyedLock } from '../lib/lock.js';
import { createInProcessLock } from '../lib/lock.js';
import type { Logger } from '../lib/logger.js';
import { silentLogger } from '../lib/logger.js';

import type { LicenseRepository, LicenseRepositoryTx } from './license.repository.js';

/**
 * Database row types
 */
const deviceRowSchema = z.object({
  id: z.string(),
  subscription_id: z.string(),
  device_id: z.string(),
  device_name: z.string().nullable(),
  device_type: z.string().nullable(),
  fingerprint: z.string().nullable(),
  os_name: z.string().nullable(),
  os_version: z.string().nullable(),
  app_version: z.string().nullable(),
  is_active: z.boolean(),
  deactivation_reason: z.enum(['user', 'subscription_cancelled']).nullable(),
  last_seen_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const subscriptionRowSchema = z.object({
  id: z.string(),
  customer_id: z.string(),
  license_key: z.string(),
  tier: z.enum(SUBSCRIPTION_TIERS),
  status: z.enum(SUBSCRIPTION_STATUSES),
  features: z.record(z.union([z.boolean(), z.number()])).nullable(),
  max_devices: z.number().int(),
  starts_at: z.string(),
  expires_at: z.string().nullable(),
  grace_period_days: z.number().int(),
  auto_renew: z.boolean(),
  metadata: z.record(z.unknown()).nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  devices: z.array(deviceRowSchema).optional(),
});

export type DeviceRow = z.infer<typeof deviceRowSchema>;
export type SubscriptionRow = z.infer<typeof subscriptionRowSchema>;

type DeviceColumns = Omit<DeviceRow, 'id'>;
type SubscriptionColumns = Omit<SubscriptionRow, 'id' | 'devices'>;

const SUBSCRIPTION_SELECT = '*, devices(*)';

/**
 * Map database row to Device entity
 */
export function mapRowToDevice(row: DeviceRow): Device {
  return {
    id: row.id,
    subscriptionId: row.subscription_id,
    deviceId: row.device_id,
    deviceName: row.device_name,
    deviceType: row.device_type,
    fingerprint: row.fingerprint,
    osName: row.os_name,
    osVersion: row.os_version,
    appVersion: row.app_version,
    isActive: row.is_active,
    deactivationReason: row.deactivation_reason,
    lastSeenAt: row.last_seen_at === null ? null : new Date(row.last_seen_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Map database row (with embedded devices) to Subscription entity
 */
export function mapRowToSubscription(row: SubscriptionRow): Subscription {
  const devices = (row.devices ?? [])
    .map(mapRowToDevice)
    .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

  return {
    id: row.id,
    customerId: row.customer_id,
    licenseKey: row.license_key,
    tier: row.tier,
    status: row.status,
    features: row.features ?? {},
    maxDevices: row.max_devices,
    startsAt: new Date(row.starts_at),
    expiresAt: row.expires_at === null ? null : new Date(row.expires_at),
    gracePeriodDays: row.grace_period_days,
    autoRenew: row.auto_renew,
    metadata: row.metadata ?? {},
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    devices,
  };
}

export function mapDeviceToColumns(device: NewDevice): DeviceColumns {
  return {
    subscription_id: device.subscriptionId,
    device_id: device.deviceId,
    device_name: device.deviceName,
    device_type: device.deviceType,
    fingerprint: device.fingerprint,
    os_name: device.osName,
    os_version: device.osVersion,
    app_version: device.appVersion,
    is_active: device.isActive,
    deactivation_reason: device.deactivationReason,
    last_seen_at: device.lastSeenAt === null ? null : device.lastSeenAt.toISOString(),
    created_at: device.createdAt.toISOString(),
    updated_at: device.updatedAt.toISOString(),
  };
}

export function mapSubscriptionToColumns(
  subscription: NewSubscription
): SubscriptionColumns {
  return {
    customer_id: subscription.customerId,
    license_key: subscription.licenseKey,
    tier: subscription.tier,
    status: subscription.status,
    features: subscription.features,
    max_devices: subscription.maxDevices,
    starts_at: subscription.startsAt.toISOString(),
    expires_at:
      subscription.expiresAt === null ? null : subscription.expiresAt.toISOString(),
    grace_period_days: subscription.gracePeriodDays,
    auto_renew: subscription.autoRenew,
    metadata: subscription.metadata,
    created_at: subscription.createdAt.toISOString(),
    updated_at: subscription.updatedAt.toISOString(),
  };
}

function parseRow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  entity: string,
  operation: string
): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new RepositoryError(`Unexpected ${entity} row shape`, {
      entity,
      operation,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

interface JournalEntry {
  description: string;
  undo: () => Promise<void>;
}

export interface LicenseRepositoryDbOptions {
  /** Serializes units of work; defaults to an in-process lock */
  lock?: KeyedLock;
  logger?: Logger;
}

/**
 * Create LicenseRepository implementation using Supabase
 */
export function createLicenseRepositoryDb(
  supabase: SupabaseClient,
  options: LicenseRepositoryDbOptions = {}
): LicenseRepository {
  const lock = options.lock ?? createInProcessLock();
  const logger = options.logger ?? silentLogger;

  function fail(
    message: string,
    entity: string,
    operation: string,
    cause: unknown
  ): RepositoryError {
    return new RepositoryError(message, { entity, operation, cause });
  }

  async function fetchSubscriptionRow(
    column: 'id' | 'license_key',
    value: string
  ): Promise<SubscriptionRow | null> {
    const { data, error } = await supabase
      .from('subscriptions')
      .select(SUBSCRIPTION_SELECT)
      .eq(column, value)
      .single();

    if (error !== null) {
      if (error.code === 'PGRST116') {
        // No rows returned
        return null;
      }
      throw fail(`Failed to get subscription: ${error.message}`, 'subscription', 'get', error);
    }

    return parseRow(subscriptionRowSchema, data, 'subscription', 'get');
  }

  async function fetchDeviceRow(id: string): Promise<DeviceRow> {
    const { data, error } = await supabase
      .from('devices')
      .select('*')
      .eq('id', id)
      .single();

    if (error !== null) {
      throw fail(`Failed to get device: ${error.message}`, 'device', 'get', error);
    }

    return parseRow(deviceRowSchema, data, 'device', 'get');
  }

  async function deleteRow(table: 'subscriptions' | 'devices', id: string): Promise<void> {
    const { error } = await supabase.from(table).delete().eq('id', id);
    if (error !== null) {
      throw fail(`Failed to delete from ${table}: ${error.message}`, table, 'delete', error);
    }
  }

  async function restoreRow(
    table: 'subscriptions' | 'devices',
    id: string,
    columns: SubscriptionColumns | DeviceColumns
  ): Promise<void> {
    const { error } = await supabase.from(table).update(columns).eq('id', id);
    if (error !== null) {
      throw fail(`Failed to restore ${table} row: ${error.message}`, table, 'restore', error);
    }
  }

  function operations(journal: JournalEntry[] | null): LicenseRepositoryTx {
    const record = (entry: JournalEntry) => {
      journal?.push(entry);
    };

    return {
      async getSubscriptionByLicenseKey(licenseKey: string) {
        const row = await fetchSubscriptionRow('license_key', licenseKey);
        return row === null ? null : mapRowToSubscription(row);
      },

      async getSubscriptionById(subscriptionId: string) {
        const row = await fetchSubscriptionRow('id', subscriptionId);
        return row === null ? null : mapRowToSubscription(row);
      },

      async createSubscription(subscription: NewSubscription) {
        const { data, error } = await supabase
          .from('subscriptions')
          .insert(mapSubscriptionToColumns(subscription))
          .select(SUBSCRIPTION_SELECT)
          .single();

        if (error !== null) {
          throw fail(
            `Failed to create subscription: ${error.message}`,
            'subscription',
            'create',
            error
          );
        }

        const created = mapRowToSubscription(
          parseRow(subscriptionRowSchema, data, 'subscription', 'create')
        );
        record({
          description: `delete subscription ${created.id}`,
          undo: () => deleteRow('subscriptions', created.id),
        });
        return created;
      },

      async updateSubscription(subscription: Subscription) {
        const before = await fetchSubscriptionRow('id', subscription.id);
        if (before === null) {
          throw new RepositoryError(`Subscription ${subscription.id} not found`, {
            entity: 'subscription',
            operation: 'update',
          });
        }

        const { data, error } = await supabase
          .from('subscriptions')
          .update(mapSubscriptionToColumns(subscription))
          .eq('id', subscription.id)
          .select(SUBSCRIPTION_SELECT)
          .single();

        if (error !== null) {
          throw fail(
            `Failed to update subscription: ${error.message}`,
            'subscription',
            'update',
            error
          );
        }

        const { id, devices: _devices, ...previous } = before;
        record({
          description: `restore subscription ${id}`,
          undo: () => restoreRow('subscriptions', id, previous),
        });
        return mapRowToSubscription(
          parseRow(subscriptionRowSchema, data, 'subscription', 'update')
        );
      },

      async createDevice(device: NewDevice) {
        const { data, error } = await supabase
          .from('devices')
          .insert(mapDeviceToColumns(device))
          .select('*')
          .single();

        if (error !== null) {
          throw fail(`Failed to create device: ${error.message}`, 'device', 'create', error);
        }

        const created = mapRowToDevice(parseRow(deviceRowSchema, data, 'device', 'create'));
        record({
          description: `delete device ${created.id}`,
          undo: () => deleteRow('devices', created.id),
        });
        return created;
      },

      async updateDevice(device: Device) {
        const { id, ...previous } = await fetchDeviceRow(device.id);

        const { data, error } = await supabase
          .from('devices')
          .update(mapDeviceToColumns(device))
          .eq('id', device.id)
          .select('*')
          .single();

        if (error !== null) {
          throw fail(`Failed to update device: ${error.message}`, 'device', 'update', error);
        }

        record({
          description: `restore device ${id}`,
          undo: () => restoreRow('devices', id, previous),
        });
        return mapRowToDevice(parseRow(deviceRowSchema, data, 'device', 'update'));
      },

      async listExpiringSubscriptions(now: Date, before: Date) {
        const { data, error } = await supabase
          .from('subscriptions')
          .select(SUBSCRIPTION_SELECT)
          .in('status', ['active', 'expired'])
          .gt('expires_at', now.toISOString())
          .lte('expires_at', before.toISOString())
          .order('expires_at', { ascending: true });

        if (error !== null) {
          throw fail(
            `Failed to list expiring subscriptions: ${error.message}`,
            'subscription',
            'list',
            error
          );
        }

        return parseRow(z.array(subscriptionRowSchema), data, 'subscription', 'list').map(
          mapRowToSubscription
        );
      },
    };
  }

  async function compensate(journal: JournalEntry[]): Promise<void> {
    for (const entry of [...journal].reverse()) {
      try {
        await entry.undo();
      } catch (err) {
        logger.error('Rollback step failed', { step: entry.description, error: err });
      }
    }
  }

  return {
    ...operations(null),

    async transaction<T>(
      lockKey: string,
      work: (tx: LicenseRepositoryTx) => Promise<T>
    ): Promise<T> {
      return lock.withLock(lockKey, async () => {
        const journal: JournalEntry[] = [];
        try {
          return await work(operations(journal));
        } catch (err) {
          if (journal.length > 0) {
            logger.warn('Rolling back unit of work', {
              steps: journal.length,
              error: err,
            });
            await compensate(journal);
          }
          throw err;
        }
      });
    },
  };
}
