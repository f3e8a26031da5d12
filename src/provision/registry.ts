/**
 * Installer Registry
 *
 * Orders tool specs so every dependency comes before its dependents.
 */

import type { ToolSpec } from '../types/index.js';
import { CatalogError, CyclicDependencyError, UnknownToolError } from './errors.js';

/**
 * Find one cycle among the unresolved specs, as a closed path (a -> b -> a)
 */
function findCycle(remaining: Map<string, ToolSpec>): string[] {
  const visiting: string[] = [];
  const done = new Set<string>();

  const visit = (name: string): string[] | null => {
    const start = visiting.indexOf(name);
    if (start !== -1) return [...visiting.slice(start), name];
    if (done.has(name)) return null;

    visiting.push(name);
    for (const dep of remaining.get(name)?.dependsOn ?? []) {
      if (!remaining.has(dep)) continue;
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    visiting.pop();
    done.add(name);
    return null;
  };

  for (const name of remaining.keys()) {
    const cycle = visit(name);
    if (cycle) return cycle;
  }
  return [...remaining.keys()];
}

/**
 * Topologically sort specs over dependsOn.
 *
 * Ties go to declaration order. Dependencies on tools outside `specs` are ignored.
 *
 * @throws CatalogError on duplicate names
 * @throws CyclicDependencyError when the dependencies form a cycle
 */
export function resolveOrder(specs: readonly ToolSpec[]): ToolSpec[] {
  const remaining = new Map<string, ToolSpec>();
  for (const spec of specs) {
    if (remaining.has(spec.name)) {
      throw new CatalogError('Duplicate tool name: ' + spec.name);
    }
    remaining.set(spec.name, spec);
  }

  const ordered: ToolSpec[] = [];

  while (remaining.size > 0) {
    // Map iteration follows insertion, which is declaration order
    let next: ToolSpec | undefined;
    for (const spec of remaining.values()) {
      // Placed and out-of-set dependencies are both absent from remaining
      const ready = spec.dependsOn.every((dep) => !remaining.has(dep));
      if (ready) {
        next = spec;
        break;
      }
    }

    if (!next) {
      throw new CyclicDependencyError(findCycle(remaining));
    }

    ordered.push(next);
    remaining.delete(next.name);
  }

  return ordered;
}

export interface Selection {
  only?: readonly string[];
  skip?: readonly string[];
}

/**
 * Restrict specs to `only` (when given) minus `skip`, keeping declaration order
 *
 * @throws UnknownToolError when a selected name is not in specs
 */
export function selectTools(specs: readonly ToolSpec[], selection: Selection): ToolSpec[] {
  const known = new Set(specs.map((spec) => spec.name));
  const requested = [...(selection.only ?? []), ...(selection.skip ?? [])];
  const unknown = requested.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new UnknownToolError([...new Set(unknown)]);
  }

  const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : null;
  const skip = new Set(selection.skip ?? []);
  return specs.filter((spec) => (only === null || only.has(spec.name)) && !skip.has(spec.name));
}
