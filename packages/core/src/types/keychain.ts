/**
 * 钥匙串相关类型定义
 */

/** 安全级别标签 */
export type SecurityLevel = 'SL3' | 'SL5';

/** 密钥元数据文档中的一条密钥记录 */
export interface KeyRecord {
  /** 密钥标识（在钥匙串内唯一） */
  readonly identifier: string;
  /** 安全级别 */
  readonly level: string;
  /** PBKDF2迭代次数 */
  readonly iterations: number;
  /** Base64 编码的 Salted__ 密文，包装原始密钥 */
  readonly data: string;
  /** Base64 编码的 Salted__ 校验密文 */
  readonly validation: string;
}

/** 密钥元数据文档（1password.keys） */
export interface KeyListDocument {
  /** SL3 级别对应的密钥标识 */
  readonly sl3?: string;
  /** SL5 级别对应的密钥标识 */
  readonly sl5?: string;
  /** 密钥记录列表 */
  readonly keys: readonly KeyRecord[];
}

/** 已通过校验的密钥 */
export interface RecoveredKey {
  readonly identifier: string;
  readonly level: string;
  /** 原始密钥字节 */
  readonly key: Uint8Array;
}

/** 单个密钥校验成功时传给观察者的信息（不含密钥本身） */
export interface KeyRecoveredEvent {
  identifier: string;
  level: string;
  iterations: number;
  keyLength: number;
}

/** 密钥恢复观察者 */
export type KeyRecoveryObserver = (event: KeyRecoveredEvent) => void;

/** 条目索引（contents.js）中的一条记录 */
export interface EntryRecord {
  readonly id: string;
  readonly entryType: string;
  readonly title: string;
  readonly site: string;
  /** Unix 时间戳（秒） */
  readonly date: number;
  readonly unknown1: string;
  readonly unknown2: number;
  readonly unknown3: string;
}

/** 条目查询条件 */
export interface EntryQuery {
  /** 匹配标题或站点（不区分大小写） */
  text?: string;
  /** 条目类型，如 webforms.WebForm */
  entryType?: string;
}
