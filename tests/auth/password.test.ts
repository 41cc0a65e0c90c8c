import { describe, test, expect } from '@jest/globals';
import { pbkdf2Sync } from 'crypto';
import { checkPasswordHash, generatePasswordHash, generateSalt } from '../../src/auth/password';
import { TEST_HASH_OPTIONS } from '../utils/test-database';

describe('password hashing', () => {
  test('should generate alphanumeric salts of the requested length', () => {
    expect(generateSalt(8)).toMatch(/^[A-Za-z0-9]{8}$/);
    expect(generateSalt(16)).toHaveLength(16);
  });

  test('should encode method, iterations, salt and digest', async () => {
    const hash = await generatePasswordHash('test-password', TEST_HASH_OPTIONS);

    expect(hash).toMatch(/^pbkdf2:sha256:1000\$[A-Za-z0-9]{8}\$[0-9a-f]{64}$/);
  });

  test('should salt every hash differently', async () => {
    const first = await generatePasswordHash('test-password', TEST_HASH_OPTIONS);
    const second = await generatePasswordHash('test-password', TEST_HASH_OPTIONS);

    expect(first).not.toBe(second);
  });

  test('should verify the right password only', async () => {
    const hash = await generatePasswordHash('test-password', TEST_HASH_OPTIONS);

    expect(await checkPasswordHash(hash, 'test-password')).toBe(true);
    expect(await checkPasswordHash(hash, 'wrong-password')).toBe(false);
  });

  test('should verify hashes produced elsewhere with the same format', async () => {
    const sha256 = pbkdf2Sync('test-password', 'saltsalt', 1000, 32, 'sha256').toString('hex');
    const sha512 = pbkdf2Sync('test-password', 'saltsalt', 1000, 64, 'sha512').toString('hex');

    expect(await checkPasswordHash(`pbkdf2:sha256:1000$saltsalt$${sha256}`, 'test-password')).toBe(true);
    expect(await checkPasswordHash(`pbkdf2:sha512:1000$saltsalt$${sha512}`, 'test-password')).toBe(true);
  });

  test('should reject malformed hashes', async () => {
    expect(await checkPasswordHash('test-password', 'test-password')).toBe(false);
    expect(await checkPasswordHash('pbkdf2:md5:1000$salt$abcd', 'test-password')).toBe(false);
    expect(await checkPasswordHash('pbkdf2:sha256:zero$salt$abcd', 'test-password')).toBe(false);
    expect(await checkPasswordHash('pbkdf2:sha256:1000$salt$abcd', 'test-password')).toBe(false);
  });
});
