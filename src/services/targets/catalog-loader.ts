/**
 * Target catalog discovery and loading
 *
 * Locates the catalog file, validates it against the zod schemas and builds a
 * target registry with compiled step templates. Every template is compiled
 * here, so syntax errors surface at start-up rather than mid-dispatch.
 *
 * Lookup order: explicit path, `INFRA_RUN_FILE`, `targets.json` in the
 * working directory, then the catalog bundled with the package.
 *
 */

import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  CatalogSchema,
  formatCatalogIssues,
  type CatalogTarget,
} from "../../lib/catalog-schemas.js";
import { ConfigurationError } from "../../lib/errors.js";
import type { Logger } from "../../lib/logger.js";
import { compileTemplate } from "../../lib/template.js";
import { TargetRegistry } from "./target-registry.js";
import type { StepTemplate, TargetDefinition } from "./types.js";

/**
 * Catalog file name looked up in the working directory
 *
 * @public
 */
export const CATALOG_FILE_NAME = "targets.json";

/**
 * Environment variable naming a catalog file
 *
 * @public
 */
export const CATALOG_FILE_ENV_VAR = "INFRA_RUN_FILE";

/**
 * Catalog shipped at the package root
 *
 * @public
 */
export const BUNDLED_CATALOG_PATH = fileURLToPath(
  new URL(`../../../${CATALOG_FILE_NAME}`, import.meta.url),
);

/**
 * Configuration options for catalog loading
 *
 * @public
 */
export interface CatalogLoaderOptions {
  /**
   * Directory relative paths resolve against
   */
  cwd?: string;

  /**
   * Environment consulted for `INFRA_RUN_FILE`
   */
  environment?: Readonly<Record<string, string | undefined>>;

  /**
   * Fallback catalog when no other is found
   */
  bundledPath?: string;

  /**
   * Logger for discovery diagnostics
   */
  logger?: Logger;
}

/**
 * Catalog ready for dispatch
 *
 * @public
 */
export interface LoadedCatalog {
  /**
   * Catalog name used in step banners
   */
  readonly name: string;

  /**
   * Absolute path the catalog was read from
   */
  readonly path: string;

  /**
   * Variable defaults, lowest precedence layer of the environment
   */
  readonly variables: Readonly<Record<string, string>>;

  /**
   * Registry holding every target of the catalog
   */
  readonly registry: TargetRegistry;
}

/**
 * Loads target catalogs from disk
 *
 * @public
 */
export class CatalogLoader {
  private readonly cwd: string;
  private readonly environment: Readonly<Record<string, string | undefined>>;
  private readonly bundledPath: string;
  private readonly logger: Logger | undefined;

  /**
   * Create a new catalog loader
   *
   * @param options - Lookup directories and environment
   */
  constructor(options: CatalogLoaderOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.environment = options.environment ?? process.env;
    this.bundledPath = options.bundledPath ?? BUNDLED_CATALOG_PATH;
    this.logger = options.logger;
  }

  /**
   * Decide which catalog file to read
   *
   * @param explicitPath - Path given on the command line
   * @returns Absolute catalog path
   */
  async resolvePath(explicitPath?: string): Promise<string> {
    if (explicitPath) {
      return path.resolve(this.cwd, explicitPath);
    }

    const fromEnvironment = this.environment[CATALOG_FILE_ENV_VAR]?.trim();
    if (fromEnvironment) {
      return path.resolve(this.cwd, fromEnvironment);
    }

    const local = path.join(this.cwd, CATALOG_FILE_NAME);
    if (await fileExists(local)) {
      return local;
    }

    return this.bundledPath;
  }

  /**
   * Read, validate and compile a catalog
   *
   * @param explicitPath - Path given on the command line
   * @returns Loaded catalog with its registry
   * @throws ConfigurationError when the file is unreadable or invalid
   */
  async load(explicitPath?: string): Promise<LoadedCatalog> {
    const catalogPath = await this.resolvePath(explicitPath);
    this.logger?.debug("Loading target catalog", { path: catalogPath });

    let content: string;
    try {
      content = await readFile(catalogPath, "utf8");
    } catch (error) {
      throw new ConfigurationError(`Cannot read target catalog '${catalogPath}'`, catalogPath, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Target catalog '${catalogPath}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        catalogPath,
      );
    }

    const parsed = CatalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid target catalog '${catalogPath}': ${formatCatalogIssues(parsed.error)}`,
        catalogPath,
      );
    }

    const registry = new TargetRegistry();
    for (const target of parsed.data.targets) {
      try {
        registry.register(compileTarget(target));
      } catch (error) {
        throw new ConfigurationError(
          `Invalid target '${target.name}' in '${catalogPath}': ${error instanceof Error ? error.message : String(error)}`,
          catalogPath,
          { targetName: target.name },
        );
      }
    }

    this.logger?.debug("Target catalog loaded", {
      path: catalogPath,
      targets: registry.getTargetCount(),
    });

    return {
      name: parsed.data.name,
      path: catalogPath,
      variables: parsed.data.variables,
      registry,
    };
  }
}

/**
 * Turn a validated catalog entry into a target definition
 *
 * @param target - Parsed catalog entry
 * @returns Target definition with compiled templates
 * @throws TemplateSyntaxError for a malformed step template
 *
 * @public
 */
export function compileTarget(target: CatalogTarget): TargetDefinition {
  const steps = target.steps.map(
    (step): StepTemplate =>
      step.cwd === undefined
        ? { command: compileTemplate(step.run) }
        : { command: compileTemplate(step.run), cwd: compileTemplate(step.cwd) },
  );

  return {
    name: target.name,
    category: target.category,
    guardedVariables: target.guards,
    steps,
    ...(target.description !== undefined && { description: target.description }),
    ...(target.banner !== undefined && { banner: target.banner }),
  };
}

/**
 * Check whether a file is accessible
 *
 * @internal
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
