// src/util/toposort.ts
import { CyclicDependencyError } from "../core/errors.js";

/**
 * Topological sort for table ordering based on FK dependencies.
 * Returns tables in an order where parent tables come before children;
 * ties keep the input order.
 */
export function toposort(
  tables: string[],
  edges: Array<{ from: string; to: string }>, // from depends on to (from has FK to to)
): string[] {
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, string[]>();

  // Initialize
  for (const table of tables) {
    inDegree.set(table, 0);
    adjacency.set(table, []);
  }

  // Build graph: edge from -> to means "from" depends on "to"
  // So we need to insert "to" before "from"
  // In adjacency, we track: to -> [from, ...] (to must come before from)
  const seen = new Set<string>();
  for (const { from, to } of edges) {
    if (!inDegree.has(from) || !inDegree.has(to)) continue;
    if (from === to) continue; // self-reference, skip
    const key = `${from}\u0000${to}`;
    if (seen.has(key)) continue;
    seen.add(key);

    adjacency.get(to)!.push(from);
    inDegree.set(from, (inDegree.get(from) ?? 0) + 1);
  }

  // Kahn's algorithm
  const queue: string[] = [];
  for (const [table, degree] of inDegree.entries()) {
    if (degree === 0) {
      queue.push(table);
    }
  }

  const result: string[] = [];
  while (queue.length > 0) {
    const current = queue.shift()!;
    result.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const newDegree = (inDegree.get(neighbor) ?? 1) - 1;
      inDegree.set(neighbor, newDegree);
      if (newDegree === 0) {
        queue.push(neighbor);
      }
    }
  }

  // Check for cycles
  if (result.length !== tables.length) {
    throw new CyclicDependencyError(tables.filter((t) => !result.includes(t)));
  }

  return result;
}
