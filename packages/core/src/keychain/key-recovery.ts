/**
 * 密钥恢复
 * PBKDF2 解包密钥，再用旧式 MD5 派生校验
 */

import { CryptoError, isKeychainError } from '../errors';
import { extractSaltedBlob } from '../crypto/salted-blob';
import { deriveLegacyKeyIv, derivePbkdf2Key, passphraseToBytes, splitKeyIv } from '../crypto/key-derivation';
import { AES_BLOCK_SIZE, aes128CbcDecrypt, pkcs7Unpad } from '../crypto/encryption';
import { base64ToBytes, constantTimeEqual, stripTrailingNul } from '../crypto/utils';
import type { Passphrase } from '../types/crypto';
import type { KeyRecord, KeyRecoveryObserver, RecoveredKey } from '../types/keychain';

function decodeField(text: string): Uint8Array {
  return base64ToBytes(stripTrailingNul(text));
}

function mismatch(record: KeyRecord, cause?: unknown): CryptoError {
  return new CryptoError('ValidationMismatch', `Key ${record.identifier} failed validation`, {
    identifier: record.identifier,
    cause,
  });
}

/**
 * 用口令解包候选密钥
 * 填充错误与口令错误无法区分，按校验失败处理
 */
function unwrapCandidate(record: KeyRecord, data: Uint8Array, passphrase: Uint8Array): Uint8Array {
  const { salt, ciphertext } = extractSaltedBlob(data);
  const { key, iv } = splitKeyIv(derivePbkdf2Key(passphrase, salt, record.iterations));

  let padded: Uint8Array;
  try {
    padded = aes128CbcDecrypt(ciphertext, key, iv);
  } catch (error) {
    throw new CryptoError('KeyDecryptionFailed', `Could not decrypt key ${record.identifier}`, {
      identifier: record.identifier,
      cause: error,
    });
  }

  try {
    return pkcs7Unpad(padded, AES_BLOCK_SIZE);
  } catch (error) {
    throw mismatch(record, error);
  }
}

/**
 * 用候选密钥本身解密校验数据
 */
function decryptValidation(record: KeyRecord, validation: Uint8Array, candidate: Uint8Array): Uint8Array {
  const { salt, ciphertext } = extractSaltedBlob(validation);
  const { key, iv } = deriveLegacyKeyIv(candidate, salt);
  const padded = aes128CbcDecrypt(ciphertext, key, iv);

  try {
    return pkcs7Unpad(padded, AES_BLOCK_SIZE);
  } catch (error) {
    if (isKeychainError(error) && error.code === 'InvalidPadding') {
      throw mismatch(record, error);
    }
    throw error;
  }
}

/**
 * 恢复并校验单个密钥
 * @param record 密钥记录
 * @param passphrase 用户口令
 */
export function recoverKey(record: KeyRecord, passphrase: Passphrase): RecoveredKey {
  const secret = passphraseToBytes(passphrase);
  const data = decodeField(record.data);
  const validation = decodeField(record.validation);

  const candidate = unwrapCandidate(record, data, secret);
  const check = decryptValidation(record, validation, candidate);

  if (!constantTimeEqual(check, candidate)) {
    throw mismatch(record);
  }

  return Object.freeze({
    identifier: record.identifier,
    level: record.level,
    key: candidate,
  });
}

/**
 * 恢复全部密钥
 * 任一记录失败则整体失败，不返回部分结果
 * @param records 密钥记录
 * @param passphrase 用户口令
 * @param observer 每个密钥校验通过后调用
 */
export function recoverKeys(
  records: readonly KeyRecord[],
  passphrase: Passphrase,
  observer?: KeyRecoveryObserver
): Map<string, RecoveredKey> {
  const keys = new Map<string, RecoveredKey>();

  for (const record of records) {
    const recovered = recoverKey(record, passphrase);
    keys.set(recovered.identifier, recovered);
    observer?.({
      identifier: recovered.identifier,
      level: recovered.level,
      iterations: record.iterations,
      keyLength: recovered.key.length,
    });
  }

  return keys;
}
