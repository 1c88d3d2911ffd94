/**
 * License Routes
 * Public endpoints called by licensed client applications
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { LicenseService } from '../../services/license.service.js';
import {
  presentActivation,
  presentLicenseClaims,
  presentValidation,
} from '../utils/present.js';
import {
  errorResponse,
  getRequestId,
  parseBody,
  successResponse,
} from '../utils/response.js';

const licenseKeySchema = z.string().min(1, 'licenseKey is required').max(128);
const deviceIdSchema = z.string().trim().min(1, 'deviceId is required').max(255);
const deviceField = z.string().max(255).optional();

const activateSchema = z.object({
  licenseKey: licenseKeySchema,
  deviceId: deviceIdSchema,
  deviceInfo: z
    .object({
      deviceName: deviceField,
      deviceType: deviceField,
      fingerprint: deviceField,
      osName: deviceField,
      osVersion: deviceField,
      appVersion: deviceField,
    })
    .optional(),
});

const validateSchema = z.object({
  licenseKey: licenseKeySchema,
  deviceId: deviceIdSchema,
  updateLastSeen: z.boolean().optional(),
});

const deactivateSchema = z.object({
  licenseKey: licenseKeySchema,
  deviceId: deviceIdSchema,
});

const checkFeatureSchema = z.object({
  licenseKey: licenseKeySchema,
  featureName: z.string().min(1, 'featureName is required').max(128),
});

const verifyTokenSchema = z.object({
  token: z.string().min(1, 'token is required'),
});

interface LicenseRoutesDeps {
  licenseService: LicenseService;
}

/**
 * Create license routes
 */
export function createLicenseRoutes(deps: LicenseRoutesDeps): Hono {
  const { licenseService } = deps;
  const app = new Hono();

  /**
   * POST /licenses/activate
   * Bind a device and receive a license token
   */
  app.post('/licenses/activate', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, activateSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const { licenseKey, deviceId, deviceInfo } = body.data;
    const result = await licenseService.activate(licenseKey, deviceId, deviceInfo ?? {});
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, presentActivation(result.data), requestId);
  });

  /**
   * POST /licenses/validate
   * Always 200; the body says whether the device may run
   */
  app.post('/licenses/validate', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, validateSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const { licenseKey, deviceId, updateLastSeen } = body.data;
    const result = await licenseService.validate(
      licenseKey,
      deviceId,
      updateLastSeen ?? true
    );

    return successResponse(c, presentValidation(result), requestId);
  });

  /**
   * POST /licenses/deactivate
   * Release the device slot
   */
  app.post('/licenses/deactivate', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, deactivateSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await licenseService.deactivate(body.data.licenseKey, body.data.deviceId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        deactivated: result.data,
        message: result.data
          ? 'Device deactivated successfully'
          : 'Device not found for this license',
      },
      requestId
    );
  });

  /**
   * POST /licenses/check-feature
   */
  app.post('/licenses/check-feature', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, checkFeatureSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await licenseService.checkFeature(
      body.data.licenseKey,
      body.data.featureName
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /licenses/verify-token
   * Always 200; invalid tokens are reported in the body
   */
  app.post('/licenses/verify-token', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, verifyTokenSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const verification = licenseService.verifyToken(body.data.token);
    if (!verification.valid) {
      return successResponse(
        c,
        { valid: false, error: verification.error, message: verification.message },
        requestId
      );
    }

    return successResponse(
      c,
      { valid: true, claims: presentLicenseClaims(verification.claims) },
      requestId
    );
  });

  return app;
}
