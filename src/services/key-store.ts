/**
 * License signing key pair
 *
 * Loaded once at startup and passed by reference to the token authority.
 * The pair is generated on first run when either file is missing.
 */

import { access, chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  type KeyObject,
} from 'node:crypto';

import type { Logger } from '../lib/logger.js';
import { silentLogger } from '../lib/logger.js';

export const RSA_MODULUS_BITS = 2048;

export interface SigningKeyPair {
  privateKey: KeyObject;
  publicKey: KeyObject;
}

export interface KeyPairPaths {
  privateKeyPath: string;
  publicKeyPath: string;
}

/**
 * Fresh RSA pair, PEM-encoded (PKCS#8 private, SPKI public)
 */
export function generateSigningKeyPair(): { privateKeyPem: string; publicKeyPem: string } {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: RSA_MODULUS_BITS,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });
  return { privateKeyPem: privateKey, publicKeyPem: publicKey };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load the pair from disk, generating and writing it when absent.
 * Errors propagate; startup treats them as fatal.
 */
export async function loadOrCreateKeyPair(
  paths: KeyPairPaths,
  logger: Logger = silentLogger
): Promise<SigningKeyPair> {
  const { privateKeyPath, publicKeyPath } = paths;

  const present =
    (await exists(privateKeyPath)) && (await exists(publicKeyPath));

  if (!present) {
    await mkdir(dirname(privateKeyPath), { recursive: true });
    await mkdir(dirname(publicKeyPath), { recursive: true });

    const { privateKeyPem, publicKeyPem } = generateSigningKeyPair();
    await writeFile(privateKeyPath, privateKeyPem, { mode: 0o600 });
    await writeFile(publicKeyPath, publicKeyPem, { mode: 0o644 });
    // writeFile only applies mode on creation
    await chmod(privateKeyPath, 0o600);
    await chmod(publicKeyPath, 0o644);

    logger.info('Generated license signing key pair', {
      privateKeyPath,
      publicKeyPath,
    });
  }

  const [privatePem, publicPem] = await Promise.all([
    readFile(privateKeyPath, 'utf8'),
    readFile(publicKeyPath, 'utf8'),
  ]);

  const keys: SigningKeyPair = {
    privateKey: createPrivateKey(privatePem),
    publicKey: createPublicKey(publicPem),
  };

  if (keys.privateKey.asymmetricKeyType !== 'rsa') {
    throw new Error(`Signing key at ${privateKeyPath} is not an RSA key`);
  }

  logger.debug('Loaded license signing key pair', { publicKeyPath });
  return keys;
}
