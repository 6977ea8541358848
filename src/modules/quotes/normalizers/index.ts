export * from './base.normalizer.js';
export { EastMoneyNormalizer } from './eastmoney.normalizer.js';
export { TencentNormalizer } from './tencent.normalizer.js';
export { SinaNormalizer, SINA_FIELD_MAP } from './sina.normalizer.js';
export { AkShareNormalizer } from './akshare.normalizer.js';
export { BaoStockNormalizer } from './baostock.normalizer.js';
export { JoinQuantNormalizer } from './joinquant.normalizer.js';
export { TushareNormalizer } from './tushare.normalizer.js';
export { NormalizerRegistry, createDefaultRegistry } from './normalizer.registry.js';
