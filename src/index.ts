/**
 * patho-case-linkage — joins pathology diagnosis and slide tables, rewrites
 * file paths and registers the cases with a dataset ingestion API.
 */

export { CaseLinkageOperator, OUTPUT_FILE_NAME, OUTPUT_FILE_TYPE, serializeRows, validateSample } from "./pipeline/operator.js";
export type { OperatorDependencies } from "./pipeline/operator.js";
export type { SampleDescriptor, PipelineRunResult, PipelineState, PipelineStage, TraceEntry, Operator } from "./pipeline/types.js";

export { parseOperatorOptions, resolveApiBaseUrl, OperatorOptionsSchema } from "./shared/config.js";
export type { OperatorConfig, OperatorOptionsInput } from "./shared/config.js";
export { InputContractError, AmbiguousSiblingError, UploadFailedError } from "./shared/errors.js";
export { ConsoleLogger, silentLogger } from "./shared/logger.js";
export type { Logger, LogLevel } from "./shared/logger.js";

export { parseCsvTable, readCsvTable } from "./tables/csv_table.js";
export type { Table, Row, CellValue } from "./tables/csv_table.js";

export { parsePathRule, transformPath, mapRecordPaths } from "./linkage/path_mapper.js";
export type { PathRule } from "./linkage/path_mapper.js";
export { filterRecords } from "./linkage/record_filter.js";
export type { RecordPredicate, FilterOptions } from "./linkage/record_filter.js";
export { innerJoin, loadCaseTables, findSiblingTable } from "./linkage/joiner.js";

export { BatchUploader, toCurlCommand } from "./upload/batch_uploader.js";
export type { UploadReport, UploadAttempt } from "./upload/batch_uploader.js";
export { DatasetApiClient } from "./upload/dataset_client.js";
export type { DatasetSink, AddFilesResponse } from "./upload/dataset_client.js";
export { partitionRows, buildBatchRecords } from "./upload/records.js";
