// 导出所有类型
export * from './types';

// 导出错误类型
export * from './errors';

// 导出加密模块
export * from './crypto';

// 导出条目索引模块
export * from './entries';

// 导出钥匙串模块
export * from './keychain';
