import { FormatError } from './errors';

/**
 * 解析JSON文本，语法错误按文档格式错误处理
 * @param raw JSON 文本
 * @param name 文档名称（用于错误信息）
 */
export function parseJsonDocument(raw: string, name: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new FormatError('MalformedDocument', `${name} is not valid JSON`, { cause: error });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
