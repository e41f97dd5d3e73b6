import * as path from 'path';

type PathFlavor = typeof path.posix;

export class PathUtils {
    /**
     * Whether a path is written in Windows form (drive letter or UNC share)
     */
    static isWindowsPath(filePath: string): boolean {
        return /^[a-zA-Z]:/.test(filePath) || filePath.startsWith('\\\\');
    }

    /**
     * Picks Windows or POSIX path semantics for a base directory
     */
    static flavorFor(basePath: string): PathFlavor {
        return this.isWindowsPath(basePath) ? path.win32 : path.posix;
    }

    /**
     * Removes every trailing '\' and '/' from a path
     */
    static trimTrailingSeparators(filePath: string): string {
        return filePath.replace(/[\\/]+$/, '');
    }

    /**
     * Normalizes path separators for cross-platform compatibility
     */
    static normalizePath(filePath: string): string {
        return filePath.replace(/\\/g, '/');
    }

    /**
     * Roots a path against a base directory. Paths that are already rooted are
     * returned as written; '.' and '..' segments of relative paths are collapsed.
     */
    static makeRooted(basePath: string, relativePath: string): string {
        const flavor = this.isWindowsPath(basePath) || this.isWindowsPath(relativePath)
            ? path.win32
            : path.posix;
        const candidate = flavor === path.posix ? this.normalizePath(relativePath) : relativePath;

        if (flavor.isAbsolute(candidate)) {
            return candidate;
        }

        const base = this.trimTrailingSeparators(basePath) + flavor.sep;
        return flavor.join(base, candidate);
    }

    /**
     * Gets the directory that contains a file, keeping the file's path flavor
     */
    static getDirectory(filePath: string): string {
        return this.flavorFor(filePath).dirname(filePath);
    }

    /**
     * Gets project name from project file path (removes extension)
     */
    static getProjectName(projectPath: string): string {
        const flavor = this.flavorFor(projectPath);
        return flavor.basename(projectPath, flavor.extname(projectPath));
    }
}
