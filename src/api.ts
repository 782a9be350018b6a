export { ContainerAnalyzer, type ContainerAnalyzerOptions } from './analyzer/container-analyzer';
export { filterEntries, filterTarget } from './analyzer/entry-filter';
export { pairFlatEntries, pairingKey, type DuplicateKeyEvent, type FlatPairingOptions } from './analyzer/flat-pairer';
export { matchPagedDirectories } from './analyzer/paged-matcher';
export { PlaceholderTemplate, substitutePlaceholder } from './analyzer/placeholder';
export { buildTask, computeSyncMapFilePath, type TaskBuildContext } from './analyzer/task-builder';
export {
  DiagnosticKind,
  type AnalysisDiagnostic,
  type ConfigSyntax,
  type Job,
  type MatchedUnit,
  type Task,
} from './analyzer/types';
export { configTextToString, parseConfigString, serializeConfig, type RawConfig } from './boundaries/config-string';
export { parseXmlConfig, type XmlConfig } from './boundaries/xml-config-parser';
export {
  loadConfigFile,
  normalizeSimpleConfig,
  normalizeStructuredConfig,
  parseTaskSettings,
  type NormalizedConfiguration,
  type SimpleConfiguration,
  type StructuredConfiguration,
} from './boundaries/config-loader';
export { openContainer } from './container/container-factory';
export { DirectoryContainer } from './container/directory-container';
export { MemoryContainer, type EntryContent } from './container/memory-container';
export { ZipContainer } from './container/zip-container';
export type { Container } from './container/types';
export { ConfigKey, HierarchyType, type JobSettings, type TaskSettings } from './schemas/config-schemas';
export {
  ConfigError,
  ContainerError,
  MissingLanguageError,
  SyncjobError,
  ValidationError,
} from './errors/index';
export type { Logger } from './output/logger';
