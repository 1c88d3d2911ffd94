/**
 * Device Registry
 *
 * SCOPE: Device slots within one subscription
 *
 * A subscription holds at most maxDevices active devices. Device ids are
 * client-supplied and only unique within their subscription.
 */

import type {
  Device,
  DeviceInfo,
  NewDevice,
  Result,
  Subscription,
} from '../types/index.js';
import { failure, success } from '../types/index.js';

export interface DeviceChange {
  subscription: Subscription;
  device: Device;
}

export function countActiveDevices(subscription: Subscription): number {
  return subscription.devices.filter((device) => device.isActive).length;
}

export function canAddDevice(subscription: Subscription): boolean {
  return countActiveDevices(subscription) < subscription.maxDevices;
}

function deviceLimitExceeded(subscription: Subscription) {
  const current = countActiveDevices(subscription);
  return failure(
    'DEVICE_LIMIT_EXCEEDED',
    `Device limit reached (${current}/${subscription.maxDevices})`,
    { current, max: subscription.maxDevices }
  );
}

export function findDevice(
  subscription: Subscription,
  clientDeviceId: string
): Device | null {
  return (
    subscription.devices.find((device) => device.deviceId === clientDeviceId) ??
    null
  );
}

/**
 * Device values for a first activation
 */
export function draftDevice(
  subscriptionId: string,
  clientDeviceId: string,
  info: DeviceInfo,
  now: Date
): NewDevice {
  return {
    subscriptionId,
    deviceId: clientDeviceId,
    deviceName: info.deviceName ?? null,
    deviceType: info.deviceType ?? null,
    fingerprint: info.fingerprint ?? null,
    osName: info.osName ?? null,
    osVersion: info.osVersion ?? null,
    appVersion: info.appVersion ?? null,
    isActive: true,
    deactivationReason: null,
    lastSeenAt: now,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Append a device, enforcing the slot limit
 */
export function addDevice(
  subscription: Subscription,
  device: Device
): Result<Subscription> {
  if (!canAddDevice(subscription)) {
    return deviceLimitExceeded(subscription);
  }
  if (findDevice(subscription, device.deviceId) !== null) {
    return failure('VALIDATION_ERROR', 'Device is already bound to this subscription', {
      deviceId: device.deviceId,
    });
  }

  return success({
    ...subscription,
    devices: [...subscription.devices, { ...device, subscriptionId: subscription.id }],
  });
}

function replaceDevice(subscription: Subscription, device: Device): Subscription {
  return {
    ...subscription,
    devices: subscription.devices.map((existing) =>
      existing.deviceId === device.deviceId ? device : existing
    ),
  };
}

/**
 * Release a slot. Returns null when the device is not bound.
 */
export function removeDevice(
  subscription: Subscription,
  clientDeviceId: string,
  now: Date
): DeviceChange | null {
  const device = findDevice(subscription, clientDeviceId);
  if (device === null) {
    return null;
  }
  if (!device.isActive) {
    return { subscription, device };
  }

  const released: Device = {
    ...device,
    isActive: false,
    deactivationReason: 'user',
    updatedAt: now,
  };
  return { subscription: replaceDevice(subscription, released), device: released };
}

/**
 * Re-enable a bound device; takes a slot like a new device would
 */
export function reactivateDevice(
  subscription: Subscription,
  clientDeviceId: string,
  now: Date
): Result<DeviceChange> {
  const device = findDevice(subscription, clientDeviceId);
  if (device === null) {
    return failure('DEVICE_NOT_FOUND', 'Device is not bound to this subscription', {
      deviceId: clientDeviceId,
    });
  }
  if (device.isActive) {
    return success({ subscription, device });
  }
  if (!canAddDevice(subscription)) {
    return deviceLimitExceeded(subscription);
  }

  const restored: Device = {
    ...device,
    isActive: true,
    deactivationReason: null,
    lastSeenAt: now,
    updatedAt: now,
  };
  return success({
    subscription: replaceDevice(subscription, restored),
    device: restored,
  });
}

/**
 * Record a check-in, refreshing any device details the client reported
 */
export function touchDevice(
  subscription: Subscription,
  clientDeviceId: string,
  now: Date,
  info: DeviceInfo = {}
): DeviceChange | null {
  const device = findDevice(subscription, clientDeviceId);
  if (device === null) {
    return null;
  }

  const touched: Device = {
    ...device,
    deviceName: info.deviceName ?? device.deviceName,
    deviceType: info.deviceType ?? device.deviceType,
    fingerprint: info.fingerprint ?? device.fingerprint,
    osName: info.osName ?? device.osName,
    osVersion: info.osVersion ?? device.osVersion,
    appVersion: info.appVersion ?? device.appVersion,
    lastSeenAt: now,
    updatedAt: now,
  };
  return { subscription: replaceDevice(subscription, touched), device: touched };
}
