/**
 * 密钥元数据文档（1password.keys）解析
 */

import { FormatError } from '../errors';
import { isRecord, parseJsonDocument } from '../json';
import type { KeyListDocument, KeyRecord, RecoveredKey, SecurityLevel } from '../types/keychain';

/**
 * 按名称取字段，名称不区分大小写
 * 文件里既有 "list" 也有 "List" 的写法
 */
function field(obj: Record<string, unknown>, name: string): unknown {
  if (name in obj) return obj[name];
  const lower = name.toLowerCase();
  const match = Object.keys(obj).find(key => key.toLowerCase() === lower);
  return match === undefined ? undefined : obj[match];
}

function optionalString(obj: Record<string, unknown>, name: string): string | undefined {
  const value = field(obj, name);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new FormatError('MalformedDocument', `Key list field ${name} must be a string`);
  }
  return value;
}

function parseKeyRecord(value: unknown, index: number): KeyRecord {
  if (!isRecord(value)) {
    throw new FormatError('MalformedDocument', `Key record ${index} is not an object`, { index });
  }

  const data = field(value, 'Data');
  const validation = field(value, 'Validation');
  const level = field(value, 'Level');
  const identifier = field(value, 'Identifier');
  const iterations = field(value, 'Iterations');

  if (
    typeof data !== 'string' ||
    typeof validation !== 'string' ||
    typeof level !== 'string' ||
    typeof identifier !== 'string' ||
    typeof iterations !== 'number' ||
    !Number.isInteger(iterations) ||
    iterations < 1
  ) {
    throw new FormatError('MalformedDocument', `Key record ${index} is malformed`, {
      index,
      identifier: typeof identifier === 'string' ? identifier : undefined,
    });
  }

  return Object.freeze({ identifier, level, iterations, data, validation });
}

/**
 * 解析密钥元数据文档
 * @param raw JSON 文本或已解析的对象
 */
export function parseKeyList(raw: string | unknown): KeyListDocument {
  const document = typeof raw === 'string' ? parseJsonDocument(raw, 'Key list') : raw;

  if (!isRecord(document)) {
    throw new FormatError('MalformedDocument', 'Key list must be a JSON object');
  }

  const list = field(document, 'List');
  if (!Array.isArray(list)) {
    throw new FormatError('MalformedDocument', 'Key list has no List array');
  }

  return Object.freeze({
    sl3: optionalString(document, 'SL3'),
    sl5: optionalString(document, 'SL5'),
    keys: Object.freeze(list.map((value: unknown, index: number) => parseKeyRecord(value, index))),
  });
}

/**
 * 按安全级别查找密钥
 * 优先使用文档中 SL3/SL5 指向的标识，其次按记录的 level 匹配
 */
export function keyForLevel(
  document: KeyListDocument,
  keys: ReadonlyMap<string, RecoveredKey>,
  level: SecurityLevel
): RecoveredKey | undefined {
  const pointer = level === 'SL3' ? document.sl3 : document.sl5;
  if (pointer !== undefined) {
    const key = keys.get(pointer);
    if (key) return key;
  }

  for (const key of keys.values()) {
    if (key.level === level) return key;
  }
  return undefined;
}
