/**
 * 密钥派生函数
 * PBKDF2-SHA1 用于解包密钥，OpenSSL EVP_BytesToKey（MD5，两轮）用于校验
 */

import { createHash, pbkdf2Sync } from 'node:crypto';
import { FormatError } from '../errors';
import type { KeyIvPair, Passphrase } from '../types/crypto';
import { concatBytes, stringToBytes } from './utils';

/** AES-128 密钥长度（字节） */
export const KEY_LENGTH = 16;

/** CBC IV 长度（字节） */
export const IV_LENGTH = 16;

/** PBKDF2 输出长度：密钥 + IV */
const PBKDF2_OUTPUT_LENGTH = KEY_LENGTH + IV_LENGTH;

function md5(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('md5').update(data).digest());
}

export function passphraseToBytes(passphrase: Passphrase): Uint8Array {
  return typeof passphrase === 'string' ? stringToBytes(passphrase) : passphrase;
}

/**
 * OpenSSL 旧式密钥派生
 * h0 = MD5(secret‖salt), h1 = MD5(h0‖secret‖salt)
 */
export function deriveLegacyKeyIv(secret: Uint8Array, salt: Uint8Array): KeyIvPair {
  const h0 = md5(concatBytes(secret, salt));
  const h1 = md5(concatBytes(h0, secret, salt));
  return { key: h0, iv: h1 };
}

/**
 * PBKDF2-HMAC-SHA1，输出32字节
 * @param passphrase 用户口令
 * @param salt 盐值
 * @param iterations 迭代次数
 */
export function derivePbkdf2Key(
  passphrase: Passphrase,
  salt: Uint8Array,
  iterations: number
): Uint8Array {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new FormatError('InvalidIterations', `Invalid PBKDF2 iteration count: ${iterations}`);
  }

  return new Uint8Array(
    pbkdf2Sync(passphraseToBytes(passphrase), salt, iterations, PBKDF2_OUTPUT_LENGTH, 'sha1')
  );
}

/** 拆分PBKDF2输出：前16字节为密钥，后16字节为IV */
export function splitKeyIv(derived: Uint8Array): KeyIvPair {
  if (derived.length !== PBKDF2_OUTPUT_LENGTH) {
    throw new FormatError('InvalidKeyLength', `Expected ${PBKDF2_OUTPUT_LENGTH} derived bytes`);
  }
  return {
    key: derived.slice(0, KEY_LENGTH),
    iv: derived.slice(KEY_LENGTH),
  };
}
