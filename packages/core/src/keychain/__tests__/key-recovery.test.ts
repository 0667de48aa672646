import { describe, it, expect, vi } from 'vitest';
import { recoverKey, recoverKeys } from '../key-recovery';
import { parseKeyList } from '../key-list';
import { bytesToHex } from '../../crypto/utils';
import { CryptoError, FormatError } from '../../errors';
import type { KeyRecord } from '../../types/keychain';
import {
  FIXTURE_KEYS,
  FIXTURE_PASSPHRASE,
  SL3_IDENTIFIER,
  SL5_IDENTIFIER,
  buildKeyListDocument,
  catchKeychainError,
  wrapDataBlob,
  wrapValidationBlob,
} from '../../__tests__/fixtures/keychain';

const fixtureRecords = (): readonly KeyRecord[] => parseKeyList(buildKeyListDocument()).keys;

const withFields = (record: KeyRecord, fields: Partial<KeyRecord>): KeyRecord => ({ ...record, ...fields });

describe('Key Recovery', () => {
  it('should recover every key of the fixture keychain', () => {
    const keys = recoverKeys(fixtureRecords(), FIXTURE_PASSPHRASE);

    expect(keys.size).toBe(FIXTURE_KEYS.length);
    for (const fixture of FIXTURE_KEYS) {
      const recovered = keys.get(fixture.identifier);
      expect(recovered?.level).toBe(fixture.level);
      expect(bytesToHex(recovered?.key ?? new Uint8Array(0))).toBe(fixture.rawKey.toString('hex'));
    }
  });

  it('should accept the passphrase as bytes', () => {
    const [record] = fixtureRecords();
    const recovered = recoverKey(record, new TextEncoder().encode(FIXTURE_PASSPHRASE));

    expect(recovered.identifier).toBe(SL5_IDENTIFIER);
    expect(recovered.key.length).toBe(1024);
  });

  it('should notify the observer once per validated key', () => {
    const observer = vi.fn();

    recoverKeys(fixtureRecords(), FIXTURE_PASSPHRASE, observer);

    expect(observer).toHaveBeenCalledTimes(2);
    expect(observer).toHaveBeenNthCalledWith(1, {
      identifier: SL5_IDENTIFIER,
      level: 'SL5',
      iterations: 1000,
      keyLength: 1024,
    });
    expect(observer).toHaveBeenNthCalledWith(2, {
      identifier: SL3_IDENTIFIER,
      level: 'SL3',
      iterations: 500,
      keyLength: 1024,
    });
  });

  it('should report a validation mismatch for every record under a wrong passphrase', () => {
    for (const record of fixtureRecords()) {
      const error = catchKeychainError(() => recoverKey(record, 'not-the-passphrase'));

      expect(error).toBeInstanceOf(CryptoError);
      expect(error.code).toBe('ValidationMismatch');
      expect(error.identifier).toBe(record.identifier);
    }
  });

  it('should fail the whole batch under a wrong passphrase', () => {
    const observer = vi.fn();
    const error = catchKeychainError(() => recoverKeys(fixtureRecords(), 'wrong', observer));

    expect(error.code).toBe('ValidationMismatch');
    expect(error.identifier).toBe(SL5_IDENTIFIER);
    expect(observer).not.toHaveBeenCalled();
  });

  it('should stop at the first bad record without returning partial keys', () => {
    const [first, second] = fixtureRecords();
    const observer = vi.fn();
    const broken = withFields(second, { validation: wrapValidationBlob(FIXTURE_KEYS[0]).toString('base64') });

    const error = catchKeychainError(() => recoverKeys([first, broken], FIXTURE_PASSPHRASE, observer));

    expect(error.code).toBe('ValidationMismatch');
    expect(error.identifier).toBe(SL3_IDENTIFIER);
    expect(observer).toHaveBeenCalledTimes(1);
  });

  it('should detect a flipped bit in the wrapped key', () => {
    const fixture = FIXTURE_KEYS[0];
    const data = wrapDataBlob(fixture, FIXTURE_PASSPHRASE);
    data[20] ^= 0x01;
    const [record] = fixtureRecords();

    const error = catchKeychainError(() =>
      recoverKey(withFields(record, { data: data.toString('base64') }), FIXTURE_PASSPHRASE)
    );

    expect(error.code).toBe('ValidationMismatch');
  });

  it('should work without the trailing NUL', () => {
    const fixture = FIXTURE_KEYS[1];
    const [, record] = fixtureRecords();
    const plain = withFields(record, {
      data: wrapDataBlob(fixture, FIXTURE_PASSPHRASE).toString('base64'),
      validation: wrapValidationBlob(fixture).toString('base64'),
    });

    expect(recoverKey(plain, FIXTURE_PASSPHRASE).identifier).toBe(SL3_IDENTIFIER);
  });

  it('should only strip a single trailing NUL', () => {
    const [record] = fixtureRecords();
    const error = catchKeychainError(() =>
      recoverKey(withFields(record, { data: `${record.data}\0` }), FIXTURE_PASSPHRASE)
    );

    expect(error).toBeInstanceOf(FormatError);
    expect(error.code).toBe('InvalidBase64');
  });

  it('should reject a data blob without the Salted__ header', () => {
    const [record] = fixtureRecords();
    const headerless = wrapDataBlob(FIXTURE_KEYS[0], FIXTURE_PASSPHRASE).subarray(8).toString('base64');

    const error = catchKeychainError(() =>
      recoverKey(withFields(record, { data: headerless }), FIXTURE_PASSPHRASE)
    );

    expect(error.code).toBe('MissingSaltHeader');
  });

  it('should report a misaligned wrapped key as a decryption failure', () => {
    const [record] = fixtureRecords();
    const truncated = wrapDataBlob(FIXTURE_KEYS[0], FIXTURE_PASSPHRASE);
    const misaligned = truncated.subarray(0, truncated.length - 1).toString('base64');

    const error = catchKeychainError(() =>
      recoverKey(withFields(record, { data: misaligned }), FIXTURE_PASSPHRASE)
    );

    expect(error).toBeInstanceOf(CryptoError);
    expect(error.code).toBe('KeyDecryptionFailed');
    expect(error.identifier).toBe(SL5_IDENTIFIER);
    expect(error.cause).toBeInstanceOf(FormatError);
  });

  it('should fail with InvalidBlockLength on a truncated validation blob', () => {
    const [record] = fixtureRecords();
    const validation = wrapValidationBlob(FIXTURE_KEYS[0]);
    const truncated = validation.subarray(0, validation.length - 5).toString('base64');

    const error = catchKeychainError(() =>
      recoverKey(withFields(record, { validation: truncated }), FIXTURE_PASSPHRASE)
    );

    expect(error).toBeInstanceOf(FormatError);
    expect(error.code).toBe('InvalidBlockLength');
  });
});
