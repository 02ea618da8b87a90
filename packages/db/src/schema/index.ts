export { conversionHistory, type ConversionHistoryRow } from './conversion-history.js';
