/**
 * OpenSSL "Salted__" 头解析
 */

import { FormatError } from '../errors';
import type { SaltedBlob } from '../types/crypto';
import { stringToBytes } from './utils';

/** 魔数 "Salted__" */
export const SALT_MAGIC = stringToBytes('Salted__');

/** 盐值长度（字节） */
export const SALT_LENGTH = 8;

const HEADER_LENGTH = SALT_MAGIC.length + SALT_LENGTH;

export function hasSaltHeader(bytes: Uint8Array): boolean {
  if (bytes.length < HEADER_LENGTH) return false;
  return SALT_MAGIC.every((byte, i) => bytes[i] === byte);
}

/**
 * 拆分 Salted__ 数据
 * 缺少魔数时直接报错，不使用全零盐值
 */
export function extractSaltedBlob(bytes: Uint8Array): SaltedBlob {
  if (!hasSaltHeader(bytes)) {
    throw new FormatError('MissingSaltHeader', 'Blob does not start with the Salted__ header');
  }

  return {
    salt: bytes.slice(SALT_MAGIC.length, HEADER_LENGTH),
    ciphertext: bytes.slice(HEADER_LENGTH),
  };
}
