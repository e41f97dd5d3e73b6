/**
 * Restore nomination handed to the package restore engine
 */

import { NamedItems } from '../core/namedItems';

export interface ProjectProperty {
    readonly name: string;
    readonly value: string;
}

export interface ReferenceProperty {
    readonly name: string;
    readonly value: string;
}

/**
 * A project, package or tool reference. `name` is the item include.
 */
export interface ReferenceItem {
    readonly name: string;
    readonly properties: NamedItems<ReferenceProperty>;
}

export interface TargetFrameworkInfo {
    /** e.g. "net8.0" */
    readonly name: string;
    readonly projectReferences: NamedItems<ReferenceItem>;
    readonly packageReferences: NamedItems<ReferenceItem>;
    readonly properties: NamedItems<ProjectProperty>;
}

export interface ProjectRestoreInfo {
    /** MSBuildProjectExtensionsPath of the project */
    readonly baseIntermediatePath?: string;
    /** TargetFrameworks as written, before splitting */
    readonly originalTargetFrameworks?: string;
    readonly targetFrameworks: NamedItems<TargetFrameworkInfo>;
    readonly toolReferences: NamedItems<ReferenceItem>;
}
