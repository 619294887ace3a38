export * from './utils/excelParser';
export * from './utils/errors';
export * from './utils/keyManager';
export * from './utils/sheetCatalog';
export * from './utils/columnAligner';
export * from './utils/duplicateDetector';
export * from './utils/sheetMerger';
export * from './utils/workbookMerger';
export * from './utils/persistence';
export * from './utils/yieldFormula';
export * from './utils/yieldCalculator';
export * from './db/historyStore';
export * from './config';
