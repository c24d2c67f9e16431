/**
 * Registry for managing target definitions
 *
 * Provides centralized registration and lookup of targets with category
 * grouping for help output. Ensures target name uniqueness and keeps
 * registration order for predictable listings.
 *
 */

import { RESERVED_TARGET_NAMES, TARGET_NAME_PATTERN } from "../../lib/catalog-schemas.js";
import { VARIABLE_NAME_PATTERN } from "../../lib/template.js";
import type { ITargetRegistry, TargetDefinition } from "./types.js";

/**
 * In-memory target registry
 *
 * @public
 */
export class TargetRegistry implements ITargetRegistry {
  private readonly targets = new Map<string, TargetDefinition>();
  private readonly categories = new Map<string, TargetDefinition[]>();

  /**
   * Register a new target
   *
   * Validates the definition and adds it to both the name and category
   * lookup structures.
   *
   * @param target - Target definition to register
   * @throws When the target name conflicts with an existing registration
   */
  register(target: TargetDefinition): void {
    if (!TARGET_NAME_PATTERN.test(target.name)) {
      throw new Error(`Invalid target name '${target.name}'`);
    }

    if (RESERVED_TARGET_NAMES.has(target.name)) {
      throw new Error(`Target name '${target.name}' is reserved`);
    }

    if (this.targets.has(target.name)) {
      throw new Error(`Target '${target.name}' is already registered`);
    }

    if (target.category.trim().length === 0) {
      throw new Error(`Target '${target.name}' must have a category`);
    }

    const invalidGuard = target.guardedVariables.find((name) => !VARIABLE_NAME_PATTERN.test(name));
    if (invalidGuard !== undefined) {
      throw new Error(`Target '${target.name}' guards invalid variable name '${invalidGuard}'`);
    }

    this.targets.set(target.name, target);

    const categoryTargets = this.categories.get(target.category);
    if (categoryTargets) {
      categoryTargets.push(target);
    } else {
      this.categories.set(target.category, [target]);
    }
  }

  /**
   * Get a target by name
   *
   * @param name - Target name
   * @returns Target definition or undefined if not found
   */
  getTarget(name: string): TargetDefinition | undefined {
    return this.targets.get(name);
  }

  /**
   * Get all registered target names in registration order
   *
   * @returns Array of target names
   */
  getAllTargetNames(): readonly string[] {
    return [...this.targets.keys()];
  }

  /**
   * Get targets grouped by category
   *
   * @returns Map of category label to its targets, both in registration order
   */
  getTargetsByCategory(): ReadonlyMap<string, readonly TargetDefinition[]> {
    const grouped = new Map<string, readonly TargetDefinition[]>();

    for (const [category, targets] of this.categories.entries()) {
      grouped.set(category, [...targets]);
    }

    return grouped;
  }

  /**
   * Get total number of registered targets
   */
  getTargetCount(): number {
    return this.targets.size;
  }
}
