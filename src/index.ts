export * from './types.js';
export * from './errors.js';
export * from './status.js';
export { extractHeader, composeDocument } from './header.js';
export type { ExtractedHeader } from './header.js';
export { decodeMetadata, encodeMetadata, parseIsoDate, ISO_DATE_FORMAT } from './metadata.js';
export type { DecodeOptions } from './metadata.js';
export { toHtml, toPlainText, parseHeadingAttributes } from './renderer.js';
export { parseRecord, assembleRecord, publicRecord, recordIdFromLocator, filenameFromLocator } from './parser.js';
export type { RecordParts } from './parser.js';
export { buildGraph, neighbors, referenceTarget } from './graph.js';
export type { Neighbors } from './graph.js';
export { computeFacets, facetList, sortFacetValues } from './facets.js';
export { computeStatistics, topN, formatStatistics, formatSummary, formatMarkdown, formatJson, parseStatsFormat } from './stats.js';
export type { StatsFormat } from './stats.js';
export * from './validation.js';
export { parseSources, loadRecords, findRecordFiles, searchRecords, failureSummary, DEFAULT_PATTERN } from './loader.js';
export type { Batch, DecodeFailure, LoadOptions, SearchOptions, SearchResult } from './loader.js';
export { renderWiki } from './wiki.js';
export type { WikiPage, WikiOptions } from './wiki.js';
export { renderViewer, parseViewerTheme, embedJson, VIEWER_THEMES } from './viewer.js';
export type { ViewerTheme, ViewerOptions } from './viewer.js';
export { createApp, buildAppData } from './server.js';
export type { AppData, AppOptions } from './server.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger, setGlobalLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
