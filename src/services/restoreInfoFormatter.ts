import { NamedItems } from '../core/namedItems';
import { ProjectRestoreInfo, ReferenceItem } from '../types/restoreInfo';

const INDENT = '  ';

function indent(level: number, text: string): string {
    return INDENT.repeat(level) + text;
}

function formatReferences(title: string, references: NamedItems<ReferenceItem>, level: number): string[] {
    const lines = [indent(level, `${title} -- (${references.size})`)];
    for (const reference of references) {
        lines.push(indent(level + 1, reference.name));
        for (const property of reference.properties) {
            lines.push(indent(level + 2, `${property.name}:${property.value}`));
        }
    }
    return lines;
}

/**
 * Renders a restore nomination as log lines
 */
export function formatRestoreInfo(info: ProjectRestoreInfo): string[] {
    const lines = [
        `BaseIntermediatePath: ${info.baseIntermediatePath ?? ''}`,
        `OriginalTargetFrameworks: ${info.originalTargetFrameworks ?? ''}`,
    ];

    for (const framework of info.targetFrameworks) {
        lines.push(indent(1, `Target Framework: ${framework.name}`));
        lines.push(indent(2, `Properties -- (${framework.properties.size})`));
        for (const property of framework.properties) {
            lines.push(indent(3, `${property.name}:${property.value}`));
        }
        lines.push(...formatReferences('Project References', framework.projectReferences, 2));
        lines.push(...formatReferences('Package References', framework.packageReferences, 2));
    }

    lines.push(...formatReferences('Tool References', info.toolReferences, 1));
    return lines;
}
