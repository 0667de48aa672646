/**
 * 钥匙串目录句柄
 * 读取 data/<profile>/ 下的 1password.keys 和 contents.js
 */

import * as fs from 'fs';
import * as path from 'path';
import { KeychainNotFoundError } from '../errors';
import { parseEntries } from '../entries/entry-index';
import type { Passphrase } from '../types/crypto';
import type {
  EntryRecord,
  KeyListDocument,
  KeyRecoveredEvent,
  RecoveredKey,
  SecurityLevel,
} from '../types/keychain';
import { keyForLevel, parseKeyList } from './key-list';
import { recoverKeys } from './key-recovery';

/** 默认配置档 */
export const DEFAULT_PROFILE = 'default';

/** 密钥元数据文件名 */
export const KEYS_FILE_NAME = '1password.keys';

/** 条目索引文件名 */
export const CONTENTS_FILE_NAME = 'contents.js';

export type KeychainLogger = Pick<Console, 'log' | 'warn'>;

export interface KeychainOptions {
  /** 配置档目录名 */
  profile: string;
  logger: KeychainLogger;
  /** 不输出日志 */
  quiet: boolean;
}

export const DEFAULT_KEYCHAIN_OPTIONS: KeychainOptions = {
  profile: DEFAULT_PROFILE,
  logger: console,
  quiet: false,
};

/** 解锁结果 */
export interface UnlockResult {
  document: KeyListDocument;
  keys: ReadonlyMap<string, RecoveredKey>;
  keyForLevel(level: SecurityLevel): RecoveredKey | undefined;
}

function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

export class AgileKeychain {
  readonly baseDir: string;
  private readonly options: KeychainOptions;
  private entryCache?: readonly EntryRecord[];

  private constructor(baseDir: string, options: KeychainOptions) {
    this.baseDir = baseDir;
    this.options = options;
  }

  /**
   * 打开钥匙串目录
   * 只检查目录存在，不读取任何文件
   */
  static open(baseDir: string, options: Partial<KeychainOptions> = {}): AgileKeychain {
    const resolved = path.resolve(baseDir);
    if (!isDirectory(resolved)) {
      throw new KeychainNotFoundError(resolved);
    }
    return new AgileKeychain(resolved, { ...DEFAULT_KEYCHAIN_OPTIONS, ...options });
  }

  get profileDir(): string {
    return path.join(this.baseDir, 'data', this.options.profile);
  }

  get keysPath(): string {
    return path.join(this.profileDir, KEYS_FILE_NAME);
  }

  get contentsPath(): string {
    return path.join(this.profileDir, CONTENTS_FILE_NAME);
  }

  private readDocument(filePath: string): string {
    if (!fs.existsSync(filePath)) {
      throw new KeychainNotFoundError(filePath, `Keychain file not found: ${filePath}`);
    }
    return fs.readFileSync(filePath, 'utf-8');
  }

  private log(message: string, ...details: unknown[]): void {
    if (!this.options.quiet) {
      this.options.logger.log(`[Keychain] ${message}`, ...details);
    }
  }

  /**
   * 条目索引，首次调用时解析，之后返回同一份只读数据
   */
  entries(): readonly EntryRecord[] {
    if (!this.entryCache) {
      this.entryCache = parseEntries(this.readDocument(this.contentsPath));
      this.log('Loaded entries:', this.entryCache.length);
    }
    return this.entryCache;
  }

  /**
   * 用口令恢复全部密钥，结果不保存在句柄上
   * @param passphrase 用户口令
   */
  unlock(passphrase: Passphrase): UnlockResult {
    const document = parseKeyList(this.readDocument(this.keysPath));
    this.log('Recovering keys:', document.keys.length);

    const identifiers = new Set(document.keys.map(record => record.identifier));
    if (identifiers.size !== document.keys.length && !this.options.quiet) {
      this.options.logger.warn('[Keychain] Duplicate key identifiers, later records win');
    }

    const keys = recoverKeys(document.keys, passphrase, (event: KeyRecoveredEvent) => {
      this.log('Key validated:', event.identifier, event.level);
    });

    return {
      document,
      keys,
      keyForLevel: (level: SecurityLevel) => keyForLevel(document, keys, level),
    };
  }
}
