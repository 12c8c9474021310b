export { TransactionLoader } from './transaction-loader.js';
export type { TransactionSource, TransactionLoaderOptions, CompanyFileListing } from './transaction-loader.js';
export { CachedTransactionSource } from './cache.js';
export { candidateDataRoots, resolveDataRoot, PACKAGED_DATA_ROOT } from './data-root.js';
export type { DataRootOptions, DataRootResolution } from './data-root.js';
export { scanDirectoryForCsvs, scanCompanyFiles, validateDirectory } from './directory-scanner.js';
export type { CsvFileInfo, ScanResult, ScanOptions, SkippedFile } from './directory-scanner.js';
export { CsvRow, parseCsvTable, readCsvTable } from './csv-reader.js';
export type { CsvTable } from './csv-reader.js';
export { SHAPE_SIGNATURES, SHAPE_PRIORITY, detectShape } from './shapes.js';
export { normalizeStatus } from './status.js';
export { convertToReporting } from './fx.js';
export type { FxRates } from './fx.js';
export { ROW_PARSERS, parseUnifiedPaymentRow, parseBalanceHistoryRow, parseItemisedActivityRow } from './parsers/index.js';
export type { ParseContext, RowParser } from './parsers/index.js';
