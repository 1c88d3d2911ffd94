/**
 * Auth Routes Unit Tests
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { z } from 'zod';

import { TEST_API_KEY } from '../../fixtures/index.js';
import type { TestHarness } from '../../helpers/test-utils.js';
import { createTestHarness, jsonRequest, readData } from '../../helpers/test-utils.js';

describe('Auth Routes', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = createTestHarness();
  });

  describe('POST /auth/token', () => {
    it('should issue an admin token for the operator API key', async () => {
      const res = await harness.app.request(
        '/api/v1/auth/token',
        jsonRequest('POST', { apiKey: TEST_API_KEY, operatorId: 'ops-1' })
      );

      expect(res.status).toBe(200);
      const data = await readData(
        res,
        z.object({ accessToken: z.string(), tokenType: z.string(), expiresAt: z.string() })
      );
      expect(data.tokenType).toBe('Bearer');
      expect(data.expiresAt).toBe('2025-06-01T12:30:00.000Z');

      const verification = harness.accessTokens.verify(data.accessToken);
      expect(verification.valid && verification.claims).toMatchObject({
        subject: 'ops-1',
        role: 'admin',
      });
    });

    it('should issue a viewer token when asked', async () => {
      const data = await readData(
        await harness.app.request(
          '/api/v1/auth/token',
          jsonRequest('POST', { apiKey: TEST_API_KEY, role: 'viewer' })
        ),
        z.object({ accessToken: z.string() })
      );

      const verification = harness.accessTokens.verify(data.accessToken);
      expect(verification.valid && verification.claims).toMatchObject({
        subject: 'operator',
        role: 'viewer',
      });
    });

    it('should reject a wrong API key', async () => {
      const res = await harness.app.request(
        '/api/v1/auth/token',
        jsonRequest('POST', { apiKey: 'not-the-key' })
      );

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Invalid API key',
          requestId: expect.any(String),
        },
      });
    });

    it('should reject a missing API key', async () => {
      const res = await harness.app.request('/api/v1/auth/token', jsonRequest('POST', {}));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'apiKey: Required' },
      });
    });

    it('should reject roles other than admin and viewer', async () => {
      const res = await harness.app.request(
        '/api/v1/auth/token',
        jsonRequest('POST', { apiKey: TEST_API_KEY, role: 'system' })
      );

      expect(res.status).toBe(400);
    });
  });
});
