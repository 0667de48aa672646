/**
 * AES-128-CBC 解密与 PKCS#7 填充
 */

import { createDecipheriv } from 'node:crypto';
import { CryptoError, FormatError } from '../errors';
import { IV_LENGTH, KEY_LENGTH } from './key-derivation';

/** AES 分组长度 */
export const AES_BLOCK_SIZE = 16;

function assertKeyIv(key: Uint8Array, iv: Uint8Array): void {
  if (key.length !== KEY_LENGTH || iv.length !== IV_LENGTH) {
    throw new FormatError(
      'InvalidKeyLength',
      `AES-128-CBC needs a ${KEY_LENGTH}-byte key and ${IV_LENGTH}-byte IV`
    );
  }
}

function assertBlockAligned(data: Uint8Array): void {
  if (data.length === 0 || data.length % AES_BLOCK_SIZE !== 0) {
    throw new FormatError(
      'InvalidBlockLength',
      `Ciphertext length ${data.length} is not a nonzero multiple of ${AES_BLOCK_SIZE}`
    );
  }
}

/**
 * AES-128-CBC 解密（不自动去除填充）
 * @param ciphertext 密文
 * @param key 16字节密钥
 * @param iv 16字节IV
 */
export function aes128CbcDecrypt(ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
  assertBlockAligned(ciphertext);
  assertKeyIv(key, iv);

  const decipher = createDecipheriv('aes-128-cbc', key, iv);
  decipher.setAutoPadding(false);
  return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
}

/** PKCS#7 填充 */
export function pkcs7Pad(data: Uint8Array, blockSize: number = AES_BLOCK_SIZE): Uint8Array {
  const padLength = blockSize - (data.length % blockSize);
  const result = new Uint8Array(data.length + padLength);
  result.set(data);
  result.fill(padLength, data.length);
  return result;
}

/**
 * 去除 PKCS#7 填充
 * 只检查最后 p 个字节
 */
export function pkcs7Unpad(data: Uint8Array, blockSize: number = AES_BLOCK_SIZE): Uint8Array {
  if (data.length === 0) {
    throw new CryptoError('InvalidPadding', 'Cannot unpad empty data');
  }

  const padLength = data[data.length - 1];
  if (padLength === 0 || padLength > data.length || padLength > blockSize) {
    throw new CryptoError('InvalidPadding', `Invalid PKCS#7 pad length ${padLength}`);
  }

  let mismatch = 0;
  for (let i = data.length - padLength; i < data.length; i++) {
    mismatch |= data[i] ^ padLength;
  }
  if (mismatch !== 0) {
    throw new CryptoError('InvalidPadding', 'Inconsistent PKCS#7 padding bytes');
  }

  return data.slice(0, data.length - padLength);
}
