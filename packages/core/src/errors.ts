/**
 * 错误类型
 */

export type FormatErrorCode =
  | 'MissingSaltHeader'
  | 'InvalidBlockLength'
  | 'InvalidKeyLength'
  | 'InvalidBase64'
  | 'InvalidIterations'
  | 'MalformedEntry'
  | 'MalformedDocument';

export type CryptoErrorCode = 'KeyDecryptionFailed' | 'ValidationMismatch' | 'InvalidPadding';

export type KeychainErrorCode = FormatErrorCode | CryptoErrorCode | 'KeychainNotFound';

export interface KeychainErrorContext {
  /** 出错的密钥标识 */
  identifier?: string;
  /** 出错的数组下标 */
  index?: number;
  cause?: unknown;
}

export class KeychainError extends Error {
  code: KeychainErrorCode;
  identifier?: string;
  index?: number;

  constructor(message: string, code: KeychainErrorCode, context: KeychainErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.code = code;
    this.identifier = context.identifier;
    this.index = context.index;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** 文档结构或编码错误 */
export class FormatError extends KeychainError {
  declare code: FormatErrorCode;

  constructor(code: FormatErrorCode, message: string, context?: KeychainErrorContext) {
    super(message, code, context);
  }
}

/** 解密或校验失败 */
export class CryptoError extends KeychainError {
  declare code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string, context?: KeychainErrorContext) {
    super(message, code, context);
  }
}

export class KeychainNotFoundError extends KeychainError {
  /** 找不到的路径 */
  path: string;

  constructor(path: string, message: string = `Keychain not found: ${path}`) {
    super(message, 'KeychainNotFound');
    this.path = path;
  }
}

export function isKeychainError(error: unknown): error is KeychainError {
  return error instanceof KeychainError;
}
