export { ConversionActivityLog, type ActivityLogOptions } from './activity-log.js';
export { CurrencyConverter } from './converter.js';
export { createConversionStack, type ConversionStack, type ConversionStackOptions } from './factory.js';
export { ConversionHistoryRepository } from './repository.js';
export { ConversionService, type ConversionServiceDeps } from './service.js';
export type { RecordStore } from './types.js';
