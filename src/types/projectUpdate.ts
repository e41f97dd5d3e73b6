/**
 * Snapshots produced for one project configuration by the project evaluation
 * side. Properties and items are insertion-ordered maps.
 */

export type PropertyBag = ReadonlyMap<string, string>;

/**
 * Item include (path or package id) -> item metadata
 */
export type ItemBag = ReadonlyMap<string, PropertyBag>;

export interface ProjectRuleSnapshot {
    readonly ruleName: string;
    readonly properties: PropertyBag;
    readonly items: ItemBag;
}

export interface ProjectChangeDiff {
    readonly anyChanges: boolean;
    readonly addedItems: ReadonlySet<string>;
    readonly removedItems: ReadonlySet<string>;
    readonly changedItems: ReadonlySet<string>;
    readonly changedProperties: ReadonlySet<string>;
}

export interface ProjectChangeDescription {
    readonly before: ProjectRuleSnapshot;
    readonly after: ProjectRuleSnapshot;
    readonly difference: ProjectChangeDiff;
}

export interface ProjectConfiguration {
    /** e.g. "Debug|AnyCPU|net8.0" */
    readonly name: string;
    readonly dimensions: PropertyBag;
}

export interface ProjectSubscriptionUpdate {
    readonly projectChanges: ReadonlyMap<string, ProjectChangeDescription>;
    readonly projectConfiguration: ProjectConfiguration;
}

export interface ProjectValueVersions {
    readonly dataSourceVersions: ReadonlyMap<string, number>;
}

export interface ProjectVersionedValue<T> extends ProjectValueVersions {
    readonly value: T;
}

export type ProjectUpdate = ProjectVersionedValue<ProjectSubscriptionUpdate>;

/**
 * Narrows a versioned value to a subscription update
 */
export function isProjectSubscriptionUpdate(candidate: ProjectValueVersions): candidate is ProjectUpdate {
    if (!('value' in candidate)) {
        return false;
    }
    const value: unknown = candidate.value;
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return 'projectChanges' in value
        && value.projectChanges instanceof Map
        && 'projectConfiguration' in value
        && typeof value.projectConfiguration === 'object'
        && value.projectConfiguration !== null;
}
