import { randomBytes, scryptSync } from 'crypto';

const [callerId, apiKey] = process.argv.slice(2);

if (!callerId || !apiKey) {
  console.error('Usage: npx tsx apps/api/scripts/hash-api-key.ts <callerId> <apiKey>');
  process.exit(1);
}

const salt = randomBytes(16);
const hash = scryptSync(apiKey, salt, 32);

const saltHex = '\\x' + salt.toString('hex');
const hashHex = '\\x' + hash.toString('hex');

console.log('INSERT INTO caller_api_keys (caller_id, api_key_hash, salt) VALUES ($1, $2, $3)');
console.log('Values: ', callerId, hashHex, saltHex);
console.log('Example psql command:');
console.log(
  `INSERT INTO caller_api_keys (caller_id, api_key_hash, salt) VALUES ('${callerId}', '${hashHex}', '${saltHex}') ON CONFLICT (caller_id) DO UPDATE SET api_key_hash = EXCLUDED.api_key_hash, salt = EXCLUDED.salt, active = true;`,
);
