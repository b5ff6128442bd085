import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';

interface PackageMetadata {
  name: string;
  version: string;
}

function isPackageMetadata(value: unknown): value is PackageMetadata {
  if (typeof value !== 'object' || value === null) return false;
  return 'name' in value && typeof value.name === 'string'
    && 'version' in value && typeof value.version === 'string';
}

/**
 * Centralized path resolution for the service.
 * All file paths and directory references should go through this singleton.
 */
export class PathResolver {
  private static instance: PathResolver;

  /** Root directory of the package (where package.json lives) */
  public readonly projectRoot: string;

  /** Parsed package.json metadata */
  public readonly packageJson: PackageMetadata;

  private constructor() {
    // This file is at src/utils/paths.ts or dist/utils/paths.js; both sit two levels below the root
    const currentDir = dirname(fileURLToPath(import.meta.url));
    this.projectRoot = dirname(dirname(currentDir));

    const pkgPath = join(this.projectRoot, 'package.json');
    const parsed: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (!isPackageMetadata(parsed)) {
      throw new Error(`Malformed package.json at ${pkgPath}`);
    }
    this.packageJson = parsed;
  }

  public static getInstance(): PathResolver {
    if (!PathResolver.instance) {
      PathResolver.instance = new PathResolver();
    }
    return PathResolver.instance;
  }

  public getVersion(): string {
    return this.packageJson.version;
  }

  /**
   * Data directory for file storage and logs.
   *
   * Reads from TASKS_DATA_DIR, defaults to './data'.
   * Relative paths are resolved against project root.
   *
   * @example
   * // TASKS_DATA_DIR not set → '/path/to/project/data'
   * // TASKS_DATA_DIR='/var/lib/tasks' → '/var/lib/tasks'
   */
  public get dataDir(): string {
    return this.resolveDataDir(process.env.TASKS_DATA_DIR);
  }

  /** Absolute paths (starting with / or ~) are returned as-is. */
  public resolveDataDir(dataDir: string = 'data'): string {
    const isAbsolutePath = dataDir.startsWith('/') || dataDir.startsWith('~');

    return isAbsolutePath ? dataDir : join(this.projectRoot, dataDir);
  }
}

export const paths = PathResolver.getInstance();
