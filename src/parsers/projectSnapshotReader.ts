import * as fs from 'fs';
import { parseStringPromise } from 'xml2js';
import {
    DEFINING_PROJECT_DIRECTORY_METADATA,
    DotNetCliToolReference,
    NuGetRestore,
    PackageReference,
    ProjectReference,
    RESTORE_PROPERTY_NAMES,
} from '../core/constants';
import { logger } from '../core/logger';
import { PathUtils } from '../core/utils';
import { SettingsService } from '../services/settingsService';
import {
    ItemBag,
    ProjectChangeDescription,
    ProjectChangeDiff,
    ProjectRuleSnapshot,
    ProjectUpdate,
    PropertyBag,
} from '../types/projectUpdate';

export interface ProjectSnapshotReaderOptions {
    /** Relative to the project directory; defaults to the configured extensions directory */
    extensionsDirectory?: string;
    configuration?: string;
    platform?: string;
}

export interface ProjectSnapshot {
    projectPath: string;
    version: number;
    updates: ProjectUpdate[];
}

type XmlElement = Record<string, unknown>;

const DATA_SOURCE_NAME = 'ProjectSnapshotReader';
const ITEM_RULES = [ProjectReference.SchemaName, PackageReference.SchemaName, DotNetCliToolReference.SchemaName];
const RESERVED_ITEM_ATTRIBUTES = new Set(['Include', 'Exclude', 'Update', 'Remove', 'Condition']);
const CONDITION_PATTERN = /^\s*'([^']*)'\s*(==|!=)\s*'([^']*)'\s*$/;
const PROPERTY_REFERENCE_PATTERN = /\$\(([A-Za-z_][\w.-]*)\)/g;

const log = logger('ProjectSnapshotReader');

function isElement(value: unknown): value is XmlElement {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textOf(value: unknown): string {
    if (typeof value === 'string') {
        return value.trim();
    }
    const text = isElement(value) ? value._ : undefined;
    return typeof text === 'string' ? text.trim() : '';
}

function attributesOf(value: unknown): Map<string, string> {
    const result = new Map<string, string>();
    const attributes = isElement(value) ? value.$ : undefined;
    if (isElement(attributes)) {
        for (const [name, attribute] of Object.entries(attributes)) {
            if (typeof attribute === 'string') {
                result.set(name, attribute);
            }
        }
    }
    return result;
}

function childEntries(node: XmlElement): Array<[string, unknown[]]> {
    const entries: Array<[string, unknown[]]> = [];
    for (const [name, children] of Object.entries(node)) {
        if (name !== '$' && name !== '_' && Array.isArray(children)) {
            entries.push([name, children]);
        }
    }
    return entries;
}

function emptySnapshot(ruleName: string): ProjectRuleSnapshot {
    return { ruleName, properties: new Map(), items: new Map() };
}

function sameBag(left: PropertyBag | undefined, right: PropertyBag | undefined): boolean {
    if (!left || !right || left.size !== right.size) {
        return left === right;
    }
    for (const [name, value] of left) {
        if (right.get(name) !== value) {
            return false;
        }
    }
    return true;
}

/**
 * Compares two snapshots of the same rule
 */
export function diffSnapshots(before: ProjectRuleSnapshot, after: ProjectRuleSnapshot): ProjectChangeDiff {
    const changedProperties = new Set<string>();
    for (const name of new Set([...before.properties.keys(), ...after.properties.keys()])) {
        if (before.properties.get(name) !== after.properties.get(name)) {
            changedProperties.add(name);
        }
    }

    const addedItems = new Set([...after.items.keys()].filter(name => !before.items.has(name)));
    const removedItems = new Set([...before.items.keys()].filter(name => !after.items.has(name)));
    const changedItems = new Set([...after.items.keys()].filter(name =>
        before.items.has(name) && !sameBag(before.items.get(name), after.items.get(name))
    ));

    return {
        anyChanges: changedProperties.size > 0 || addedItems.size > 0 || removedItems.size > 0 || changedItems.size > 0,
        addedItems,
        removedItems,
        changedItems,
        changedProperties,
    };
}

interface Evaluation {
    properties: Map<string, string>;
    items: Map<string, Map<string, Map<string, string>>>;
}

/**
 * Reads project files into per-configuration update snapshots. Only static
 * evaluation is done: property references and simple string comparisons in
 * conditions are understood, imports and targets are not.
 */
export class ProjectSnapshotReader {
    private readonly extensionsDirectory: string;
    private readonly configuration: string;
    private readonly platform: string;

    constructor(options: ProjectSnapshotReaderOptions = {}) {
        this.extensionsDirectory = options.extensionsDirectory ?? SettingsService.getExtensionsDirectory();
        this.configuration = options.configuration ?? 'Debug';
        this.platform = options.platform ?? 'AnyCPU';
    }

    async readUpdates(projectPath: string, previous?: ProjectSnapshot): Promise<ProjectSnapshot> {
        let project: XmlElement;
        try {
            const content = await fs.promises.readFile(projectPath, 'utf8');
            const parsed: unknown = await parseStringPromise(content);
            const declared = isElement(parsed) ? parsed.Project : undefined;
            // xml2js parses an empty element to ''
            const root = declared === '' ? {} : declared;
            if (!isElement(root)) {
                throw new Error(`'${projectPath}' has no Project element`);
            }
            project = root;
        } catch (error) {
            log.error(`Error reading project file ${projectPath}:`, error);
            throw new Error(`Failed to read project snapshot: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }

        const version = (previous?.version ?? 0) + 1;
        const outer = this.evaluate(project, projectPath, undefined);
        const targetFrameworks = (outer.properties.get(NuGetRestore.TargetFrameworksProperty) ?? '')
            .split(';')
            .map(framework => framework.trim())
            .filter(framework => framework.length > 0);

        const updates: ProjectUpdate[] = [];
        if (targetFrameworks.length === 0) {
            updates.push(this.createUpdate(outer, projectPath, undefined, version, previous));
        } else {
            for (const targetFramework of targetFrameworks) {
                const inner = this.evaluate(project, projectPath, targetFramework);
                updates.push(this.createUpdate(inner, projectPath, targetFramework, version, previous));
            }
        }

        log.debug(`Read ${updates.length} configuration(s) from ${projectPath}`);
        return { projectPath, version, updates };
    }

    private evaluate(project: XmlElement, projectPath: string, targetFramework: string | undefined): Evaluation {
        const projectDirectory = PathUtils.getDirectory(projectPath);
        const globalProperties = new Map<string, string>([
            ['Configuration', this.configuration],
            ['Platform', this.platform],
        ]);
        if (targetFramework !== undefined) {
            globalProperties.set(NuGetRestore.TargetFrameworkProperty, targetFramework);
        }

        const properties = new Map<string, string>([
            ['MSBuildProjectFullPath', projectPath],
            ['MSBuildProjectDirectory', projectDirectory],
            ['MSBuildProjectName', PathUtils.getProjectName(projectPath)],
            ...globalProperties,
        ]);

        for (const group of this.childrenOf(project, 'PropertyGroup')) {
            if (!this.isConditionMet(group, properties)) {
                continue;
            }
            for (const [name, values] of childEntries(group)) {
                for (const value of values) {
                    if (globalProperties.has(name) || !this.isConditionMet(value, properties)) {
                        continue;
                    }
                    properties.set(name, this.expand(textOf(value), properties));
                }
            }
        }

        const items = new Map<string, Map<string, Map<string, string>>>(
            ITEM_RULES.map((rule): [string, Map<string, Map<string, string>>] => [rule, new Map()])
        );

        for (const group of this.childrenOf(project, 'ItemGroup')) {
            if (!this.isConditionMet(group, properties)) {
                continue;
            }
            for (const [itemType, elements] of childEntries(group)) {
                const bag = items.get(itemType);
                if (!bag) {
                    continue;
                }
                for (const element of elements) {
                    this.addItem(bag, itemType, element, properties, projectDirectory);
                }
            }
        }

        return { properties, items };
    }

    private addItem(
        bag: Map<string, Map<string, string>>,
        itemType: string,
        element: unknown,
        properties: ReadonlyMap<string, string>,
        projectDirectory: string
    ): void {
        if (!this.isConditionMet(element, properties)) {
            return;
        }

        const attributes = attributesOf(element);
        const include = attributes.get('Include');
        if (include === undefined) {
            log.debug(`Skipping ${itemType} without Include`);
            return;
        }

        const metadata = new Map<string, string>();
        for (const [name, value] of attributes) {
            if (!RESERVED_ITEM_ATTRIBUTES.has(name)) {
                metadata.set(name, this.expand(value, properties));
            }
        }
        if (isElement(element)) {
            for (const [name, values] of childEntries(element)) {
                const applicable = values.filter(value => this.isConditionMet(value, properties));
                if (applicable.length === 0) {
                    continue;
                }
                const last = applicable[applicable.length - 1];
                metadata.set(name, this.expand(textOf(last), properties));
            }
        }
        if (itemType === ProjectReference.SchemaName) {
            metadata.set(DEFINING_PROJECT_DIRECTORY_METADATA, projectDirectory + PathUtils.flavorFor(projectDirectory).sep);
        }

        for (const name of this.expand(include, properties).split(';')) {
            const trimmed = name.trim();
            if (trimmed.length > 0 && !bag.has(trimmed)) {
                bag.set(trimmed, new Map(metadata));
            }
        }
    }

    private createUpdate(
        evaluation: Evaluation,
        projectPath: string,
        targetFramework: string | undefined,
        version: number,
        previous: ProjectSnapshot | undefined
    ): ProjectUpdate {
        const configurationName = [this.configuration, this.platform, targetFramework]
            .filter((part): part is string => part !== undefined)
            .join('|');
        const dimensions = new Map<string, string>([
            ['Configuration', this.configuration],
            ['Platform', this.platform],
        ]);
        if (targetFramework !== undefined) {
            dimensions.set(NuGetRestore.TargetFrameworkProperty, targetFramework);
        }

        const previousUpdate = previous?.updates.find(update => update.value.projectConfiguration.name === configurationName);
        const snapshots: ProjectRuleSnapshot[] = [
            {
                ruleName: NuGetRestore.SchemaName,
                properties: this.restoreProperties(evaluation.properties, projectPath),
                items: new Map(),
            },
            ...ITEM_RULES.map((rule): ProjectRuleSnapshot => ({
                ruleName: rule,
                properties: new Map(),
                items: evaluation.items.get(rule) ?? new Map<string, PropertyBag>(),
            })),
        ];

        const projectChanges = new Map<string, ProjectChangeDescription>();
        for (const after of snapshots) {
            const before = previousUpdate?.value.projectChanges.get(after.ruleName)?.after ?? emptySnapshot(after.ruleName);
            projectChanges.set(after.ruleName, { before, after, difference: diffSnapshots(before, after) });
        }

        return {
            dataSourceVersions: new Map([[DATA_SOURCE_NAME, version]]),
            value: {
                projectChanges,
                projectConfiguration: { name: configurationName, dimensions },
            },
        };
    }

    private restoreProperties(properties: ReadonlyMap<string, string>, projectPath: string): PropertyBag {
        const projectDirectory = PathUtils.getDirectory(projectPath);
        const separator = PathUtils.flavorFor(projectDirectory).sep;
        const result = new Map<string, string>();

        for (const name of RESTORE_PROPERTY_NAMES) {
            const value = properties.get(name);
            if (value !== undefined && value.length > 0) {
                result.set(name, value);
            }
        }

        const extensionsPath = result.get(NuGetRestore.MSBuildProjectExtensionsPathProperty) ?? this.extensionsDirectory;
        const rooted = PathUtils.trimTrailingSeparators(PathUtils.makeRooted(projectDirectory, extensionsPath));
        result.set(NuGetRestore.MSBuildProjectExtensionsPathProperty, rooted + separator);

        return result;
    }

    private childrenOf(node: XmlElement, name: string): XmlElement[] {
        const children = node[name];
        return Array.isArray(children) ? children.filter(isElement) : [];
    }

    private expand(value: string, properties: ReadonlyMap<string, string>): string {
        return value.replace(PROPERTY_REFERENCE_PATTERN, (_match, name: string) => properties.get(name) ?? '');
    }

    private isConditionMet(node: unknown, properties: ReadonlyMap<string, string>): boolean {
        const condition = attributesOf(node).get('Condition');
        if (condition === undefined || condition.trim() === '') {
            return true;
        }

        const match = CONDITION_PATTERN.exec(condition);
        if (!match) {
            log.debug(`Unsupported condition ignored: ${condition}`);
            return false;
        }

        const left = this.expand(match[1], properties).toLowerCase();
        const right = this.expand(match[3], properties).toLowerCase();
        return match[2] === '==' ? left === right : left !== right;
    }
}
