import { PathUtils } from './utils';

/**
 * Read-only view of the project being restored
 */
export interface ProjectContext {
    readonly fullPath: string;
    readonly directory: string;
    makeRooted(relativePath: string): string;
}

export class Project implements ProjectContext {
    private readonly _directory: string;

    constructor(private readonly _projectPath: string) {
        this._directory = PathUtils.getDirectory(_projectPath);
    }

    get fullPath(): string {
        return this._projectPath;
    }

    get directory(): string {
        return this._directory;
    }

    get name(): string {
        return PathUtils.getProjectName(this._projectPath);
    }

    /**
     * Roots a path against the project directory
     */
    makeRooted(relativePath: string): string {
        return PathUtils.makeRooted(this._directory, relativePath);
    }
}
