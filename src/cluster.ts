import type { IssueRecord } from "./record.js";
import type { SimilarityIndex } from "./similarity.js";
import type { Cluster } from "./types.js";

export function recencyFactor(updatedAt: string, now: Date = new Date()): number {
  const ageMs = now.getTime() - new Date(updatedAt).getTime();
  const ageDays = ageMs / (1000 * 60 * 60 * 24);
  return 0.5 ** (Math.max(0, ageDays) / 30);
}

export interface ClusterOptions {
  threshold: number;
  minSize?: number;
  now?: Date;
}

function representativeScore(record: IssueRecord | undefined, now: Date): number {
  if (!record) return 0;
  return record.metrics?.activityScore ?? recencyFactor(record.updatedAt, now);
}

/**
 * Connected components of the "similarity >= threshold" graph, largest
 * first. The most active member represents each cluster.
 */
export function findClusters(index: SimilarityIndex, records: ReadonlyMap<number, IssueRecord>, opts: ClusterOptions): Cluster[] {
  const { threshold, minSize = 2, now = new Date() } = opts;
  const adjacency = new Map<number, Set<number>>();

  for (const [a, b] of index.similarPairs(threshold)) {
    if (!adjacency.has(a)) adjacency.set(a, new Set());
    if (!adjacency.has(b)) adjacency.set(b, new Set());
    adjacency.get(a)?.add(b);
    adjacency.get(b)?.add(a);
  }

  const visited = new Set<number>();
  const clusters: Cluster[] = [];

  for (const id of index.numbers()) {
    if (visited.has(id) || !adjacency.has(id)) continue;

    const component: number[] = [];
    const queue = [id];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      component.push(current);
      for (const neighbor of adjacency.get(current) ?? []) {
        if (!visited.has(neighbor)) queue.push(neighbor);
      }
    }

    if (component.length < minSize) continue;
    component.sort((a, b) => a - b);

    let totalSim = 0,
      pairs = 0;
    for (let i = 0; i < component.length; i++) {
      for (let j = i + 1; j < component.length; j++) {
        totalSim += index.similarity(component[i], component[j]) ?? 0;
        pairs++;
      }
    }

    const ranked = [...component].sort(
      (a, b) => representativeScore(records.get(b), now) - representativeScore(records.get(a), now) || a - b,
    );
    const representative = ranked[0];

    clusters.push({
      id: 0, // reassigned below
      members: component,
      representative,
      avgSimilarity: pairs > 0 ? totalSim / pairs : 0,
      theme: records.get(representative)?.title ?? `#${representative}`,
    });
  }

  // Sort by size descending, then assign sequential IDs
  clusters.sort((a, b) => b.members.length - a.members.length || a.members[0] - b.members[0]);
  clusters.forEach((c, i) => {
    c.id = i + 1;
  });

  return clusters;
}
