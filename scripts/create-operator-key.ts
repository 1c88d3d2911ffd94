/**
 * Generate an operator API key
 * Prints the raw key once and the digest to put in OPERATOR_API_KEY_HASH
 *
 * Run: npx tsx scripts/create-operator-key.ts
 */

import { randomBytes } from 'node:crypto';

import { hashApiKey } from '../src/services/access-token.service.js';

const rawKey = `op_${randomBytes(24).toString('hex')}`;

console.log('Operator API key (shown once, store it securely):');
console.log(`  ${rawKey}\n`);
console.log('Add to .env:');
console.log(`  OPERATOR_API_KEY_HASH=${hashApiKey(rawKey)}`);
