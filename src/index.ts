export * from './errors.js';
export { loadConfig, LOG_LEVELS, type DatasafeConfig, type LogLevel } from './config.js';
export { logger, createLogger, createChildLogger, setLogLevel, type Logger } from './logger.js';
export {
  ChecksumGenerator,
  DEFAULT_ALGORITHM,
  CHUNK_SIZE,
  isSupportedAlgorithm,
  checksumLabel,
  algorithmFromLabel,
} from './checksum.js';
export {
  CHECKERS,
  LoiChecker,
  checkLoi,
  type CheckerId,
  type LoiType,
  type SegmentChecker,
  type Successor,
  type ValidationOptions,
} from './loi-checker.js';
export { Loi, LoiParser, parseLoi } from './loi.js';
export {
  DefaultFormatDetector,
  EprFormatDetector,
  UNDETECTED_FORMAT,
  parseInfoFile,
  parseYamlFile,
  selectFormatDetector,
  type FormatDetector,
  type MetadataInfo,
  type MetadataParser,
} from './format-detector.js';
export {
  Manifest,
  MANIFEST_TYPE,
  MANIFEST_FORMAT_VERSION,
  type IntegrityReport,
  type ManifestDocument,
  type ManifestOptions,
} from './manifest.js';
export { packDirectory, packFiles, unpackArchive, listFiles } from './archive.js';
export { StorageBackend, type StorageBackendOptions } from './storage.js';
export { Backend } from './backend.js';
export { createHttpServer, type DatasafeHttpServer, type HttpServerOptions } from './server.js';
export {
  Client,
  LocalClient,
  HttpClient,
  integrityWarning,
  type ClientOptions,
  type DatasetFiles,
  type DownloadResult,
} from './client.js';
