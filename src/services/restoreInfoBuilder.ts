import {
    DotNetCliToolReference,
    NuGetRestore,
    PackageReference,
    ProjectReference,
} from '../core/constants';
import { logger } from '../core/logger';
import { NamedItems } from '../core/namedItems';
import { ProjectContext } from '../core/Project';
import {
    isProjectSubscriptionUpdate,
    ProjectChangeDescription,
    ProjectUpdate,
    ProjectValueVersions,
} from '../types/projectUpdate';
import { ProjectRestoreInfo, ReferenceItem, TargetFrameworkInfo } from '../types/restoreInfo';
import {
    toProjectProperties,
    toProjectReferences,
    toReferenceItem,
    toReferenceItems,
} from './restoreInfoConverters';
import { formatRestoreInfo } from './restoreInfoFormatter';

const log = logger('RestoreInfoBuilder');

/**
 * Builds the restore nomination for a project from the updates of all of its
 * configurations. Stateless: every call works on its own accumulators.
 */
export class RestoreInfoBuilder {

    /**
     * Same as {@link build}, for callers holding untyped versioned values.
     * Throws when a value is not a project subscription update.
     */
    static buildFromVersions(updates: Iterable<ProjectValueVersions>, project: ProjectContext): ProjectRestoreInfo | undefined {
        const typed: ProjectUpdate[] = [];
        let index = 0;
        for (const update of updates) {
            if (!isProjectSubscriptionUpdate(update)) {
                throw new Error(`Value at index ${index} is not a project subscription update`);
            }
            typed.push(update);
            index++;
        }
        return this.build(typed, project);
    }

    /**
     * Returns undefined when nothing changed, or when no update yields a
     * target framework; in both cases no restore should be nominated.
     */
    static build(updates: Iterable<ProjectUpdate>, project: ProjectContext): ProjectRestoreInfo | undefined {
        const snapshot = [...updates];

        if (!snapshot.some(update => this.hasAnyChanges(update))) {
            log.debug(`No restore-relevant changes for ${project.fullPath}`);
            return undefined;
        }

        let baseIntermediatePath: string | undefined;
        let originalTargetFrameworks: string | undefined;
        const targetFrameworks = new Map<string, TargetFrameworkInfo>();
        const toolReferences = new Map<string, ReferenceItem>();

        for (const update of snapshot) {
            const restoreChanges = this.getChanges(update, NuGetRestore.SchemaName);
            const restoreProperties = restoreChanges.after.properties;

            baseIntermediatePath = baseIntermediatePath ?? restoreProperties.get(NuGetRestore.MSBuildProjectExtensionsPathProperty);
            originalTargetFrameworks = originalTargetFrameworks ?? restoreProperties.get(NuGetRestore.TargetFrameworksProperty);

            const targetFramework = update.value.projectConfiguration.dimensions.get(NuGetRestore.TargetFrameworkProperty)
                ?? restoreProperties.get(NuGetRestore.TargetFrameworkProperty);

            if (!targetFramework) {
                log.warn(`Unable to find TargetFramework property for configuration '${update.value.projectConfiguration.name}'`);
            } else if (targetFrameworks.has(targetFramework)) {
                log.debug(`Target framework '${targetFramework}' already recorded, skipping configuration '${update.value.projectConfiguration.name}'`);
            } else {
                const projectReferenceChanges = this.getChanges(update, ProjectReference.SchemaName);
                const packageReferenceChanges = this.getChanges(update, PackageReference.SchemaName);

                targetFrameworks.set(targetFramework, Object.freeze({
                    name: targetFramework,
                    projectReferences: toProjectReferences(projectReferenceChanges.after.items, project),
                    packageReferences: toReferenceItems(packageReferenceChanges.after.items),
                    properties: toProjectProperties(restoreProperties),
                }));
            }

            const toolReferenceChanges = this.getChanges(update, DotNetCliToolReference.SchemaName);
            for (const [name, metadata] of toolReferenceChanges.after.items) {
                if (!toolReferences.has(name)) {
                    toolReferences.set(name, toReferenceItem(name, metadata));
                }
            }
        }

        if (targetFrameworks.size === 0) {
            log.debug(`No target frameworks found for ${project.fullPath}, skipping restore nomination`);
            return undefined;
        }

        const info: ProjectRestoreInfo = Object.freeze({
            baseIntermediatePath,
            originalTargetFrameworks,
            targetFrameworks: new NamedItems(targetFrameworks.values()),
            toolReferences: new NamedItems(toolReferences.values()),
        });

        log.info(`Nominating restore for ${project.fullPath} (${info.targetFrameworks.names().join(', ')})`);
        for (const line of formatRestoreInfo(info)) {
            log.debug(line);
        }

        return info;
    }

    private static hasAnyChanges(update: ProjectUpdate): boolean {
        for (const change of update.value.projectChanges.values()) {
            if (change.difference.anyChanges) {
                return true;
            }
        }
        return false;
    }

    private static getChanges(update: ProjectUpdate, ruleName: string): ProjectChangeDescription {
        const changes = update.value.projectChanges.get(ruleName);
        if (!changes) {
            throw new Error(`Project update is missing required rule '${ruleName}'`);
        }
        return changes;
    }
}
