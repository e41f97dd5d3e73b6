export { RestoreInfoBuilder } from './services/restoreInfoBuilder';
export { formatRestoreInfo } from './services/restoreInfoFormatter';
export {
    resolveProjectFileFullPath,
    toProjectProperties,
    toProjectReferences,
    toReferenceItem,
    toReferenceItems,
} from './services/restoreInfoConverters';
export { SettingsService } from './services/settingsService';
export { ProjectSnapshotReader, diffSnapshots } from './parsers/projectSnapshotReader';
export type { ProjectSnapshot, ProjectSnapshotReaderOptions } from './parsers/projectSnapshotReader';
export { Project } from './core/Project';
export type { ProjectContext } from './core/Project';
export { NamedItems } from './core/namedItems';
export type { Named } from './core/namedItems';
export { PathUtils } from './core/utils';
export { logger, setLogLevel, getLogLevel } from './core/logger';
export type { Logger, LogLevel } from './core/logger';
export * from './core/constants';
export * from './types/projectUpdate';
export * from './types/restoreInfo';
