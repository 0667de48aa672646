/**
 * 加密工具函数
 */

import { FormatError } from '../errors';

/** Base64 字母表（标准，带填充） */
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** OpenSSL -a 输出的换行 */
const LINE_BREAKS = /\r?\n/g;

/**
 * 严格解码Base64
 * 允许OpenSSL风格的换行，其余非法字符或长度都会报错
 */
export function base64ToBytes(base64: string): Uint8Array {
  const compact = base64.replace(LINE_BREAKS, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new FormatError('InvalidBase64', 'Invalid base64 payload');
  }
  return new Uint8Array(Buffer.from(compact, 'base64'));
}

/** 将字节编码为Base64 */
export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/** 将字符串按UTF-8编码为字节 */
export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/** 十六进制表示 */
export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

/** 拼接字节数组 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/** 去掉末尾的单个NUL字符（只去一个） */
export function stripTrailingNul(text: string): string {
  return text.endsWith('\0') ? text.slice(0, -1) : text;
}

/** 比较两个字节数组是否相等 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a[i] ^ b[i];
  }
  return result === 0;
}
