/**
 * 加密相关类型定义
 */

/** OpenSSL "Salted__" 格式拆分后的数据 */
export interface SaltedBlob {
  /** 8字节盐值 */
  salt: Uint8Array;
  /** 密文（长度应为16的倍数） */
  ciphertext: Uint8Array;
}

/** AES-128-CBC 所需的密钥和IV */
export interface KeyIvPair {
  /** 16字节密钥 */
  key: Uint8Array;
  /** 16字节初始化向量 */
  iv: Uint8Array;
}

/** 口令：字符串按UTF-8编码，或直接传入字节 */
export type Passphrase = string | Uint8Array;
