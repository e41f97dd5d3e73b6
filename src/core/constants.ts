/**
 * Rule (schema) and property names shared by the restore components
 */

export const NuGetRestore = {
    SchemaName: 'NuGetRestore',
    MSBuildProjectExtensionsPathProperty: 'MSBuildProjectExtensionsPath',
    TargetFrameworksProperty: 'TargetFrameworks',
    TargetFrameworkProperty: 'TargetFramework',
} as const;

export const ProjectReference = {
    SchemaName: 'ProjectReference',
} as const;

export const PackageReference = {
    SchemaName: 'PackageReference',
} as const;

export const DotNetCliToolReference = {
    SchemaName: 'DotNetCliToolReference',
} as const;

/**
 * Every rule an update must carry for restore aggregation
 */
export const RESTORE_RULE_NAMES = [
    NuGetRestore.SchemaName,
    ProjectReference.SchemaName,
    PackageReference.SchemaName,
    DotNetCliToolReference.SchemaName,
] as const;

export const DEFINING_PROJECT_DIRECTORY_METADATA = 'DefiningProjectDirectory';
export const PROJECT_FILE_FULL_PATH_METADATA = 'ProjectFileFullPath';

/**
 * Properties surfaced through the NuGetRestore rule
 */
export const RESTORE_PROPERTY_NAMES = [
    'MSBuildProjectExtensionsPath',
    'TargetFrameworks',
    'TargetFramework',
    'TargetFrameworkMoniker',
    'TargetPlatformMoniker',
    'TargetPlatformMinVersion',
    'RuntimeIdentifier',
    'RuntimeIdentifiers',
    'RuntimeSupports',
    'PackageTargetFallback',
    'AssetTargetFallback',
    'RestoreSources',
    'RestorePackagesPath',
    'RestoreFallbackFolders',
    'RestoreAdditionalProjectSources',
    'RestoreAdditionalProjectFallbackFolders',
    'RestoreAdditionalProjectFallbackFoldersExcludes',
    'RestoreLockedMode',
    'RestorePackagesWithLockFile',
    'NuGetLockFilePath',
    'PackageId',
    'PackageVersion',
    'Version',
    'TreatWarningsAsErrors',
    'WarningsAsErrors',
    'NoWarn',
] as const;
