/**
 * Help listing for the `help` pseudo-target
 *
 * Lists described targets grouped under their category labels, in catalog
 * order. Targets without a description stay runnable but are not listed.
 *
 */

import type { ITargetRegistry } from "../services/targets/types.js";

/**
 * Column width target names are padded to
 *
 * @public
 */
export const HELP_NAME_WIDTH = 25;

/**
 * Render the target listing
 *
 * @param registry - Registry to list
 * @param bin - Executable name shown in the usage line
 * @returns Multi-line help text starting with an empty line
 *
 * @public
 */
export function formatTargetHelp(
  registry: Pick<ITargetRegistry, "getTargetsByCategory">,
  bin = "infra-run",
): string {
  const lines = ["", "Usage:", `  ${bin} <target> [KEY=VALUE...]`];

  for (const [category, targets] of registry.getTargetsByCategory()) {
    const described = targets.filter((target) => target.description !== undefined);
    if (described.length === 0) {
      continue;
    }

    lines.push("", category);
    for (const target of described) {
      lines.push(`  ${target.name.padEnd(HELP_NAME_WIDTH)} ${target.description ?? ""}`);
    }
  }

  return lines.join("\n");
}
