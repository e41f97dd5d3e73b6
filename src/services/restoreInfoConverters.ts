import { DEFINING_PROJECT_DIRECTORY_METADATA, PROJECT_FILE_FULL_PATH_METADATA } from '../core/constants';
import { NamedItems } from '../core/namedItems';
import { ProjectContext } from '../core/Project';
import { PathUtils } from '../core/utils';
import { ItemBag, PropertyBag } from '../types/projectUpdate';
import { ProjectProperty, ReferenceItem, ReferenceProperty } from '../types/restoreInfo';

export function toProjectProperties(properties: PropertyBag): NamedItems<ProjectProperty> {
    return new NamedItems([...properties].map(([name, value]) => ({ name, value })));
}

export function toReferenceItem(
    name: string,
    metadata: PropertyBag,
    extraProperties: readonly ReferenceProperty[] = []
): ReferenceItem {
    const properties: ReferenceProperty[] = [...metadata].map(([key, value]) => ({ name: key, value }));
    properties.push(...extraProperties);
    return Object.freeze({ name, properties: new NamedItems(properties) });
}

export function toReferenceItems(items: ItemBag): NamedItems<ReferenceItem> {
    return new NamedItems([...items].map(([name, metadata]) => toReferenceItem(name, metadata)));
}

/**
 * Full path of a project reference: relative to the project that declared it
 * when MSBuild tells us which one that was, otherwise relative to this project.
 */
export function resolveProjectFileFullPath(name: string, metadata: PropertyBag, project: ProjectContext): string {
    const definingProjectDirectory = metadata.get(DEFINING_PROJECT_DIRECTORY_METADATA);
    return definingProjectDirectory !== undefined
        ? PathUtils.makeRooted(definingProjectDirectory, name)
        : project.makeRooted(name);
}

export function toProjectReferences(items: ItemBag, project: ProjectContext): NamedItems<ReferenceItem> {
    return new NamedItems([...items].map(([name, metadata]) =>
        toReferenceItem(name, metadata, [{
            name: PROJECT_FILE_FULL_PATH_METADATA,
            value: resolveProjectFileFullPath(name, metadata, project),
        }])
    ));
}
