import type { BoundingBox, Component, SpriteCluster } from './types';
import { MERGE_PROXIMITY_PX, NOISE_AREA_THRESHOLD } from './constants';

// ============================================================================
// Union-find
// ============================================================================

class DisjointSet {
  private parent: Int32Array;

  constructor(size: number) {
    this.parent = new Int32Array(size);
    for (let i = 0; i < size; i++) this.parent[i] = i;
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) root = this.parent[root];
    // Path compression
    while (this.parent[x] !== root) {
      const next = this.parent[x];
      this.parent[x] = root;
      x = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // Keep the smaller label as root so labels follow scan order
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

// ============================================================================
// Component labeling
// ============================================================================

/**
 * Two-pass connected-component labeling over foreground pixels using
 * 8-connectivity.
 *
 * @param mask background mask, 1 = background
 * @returns components in order of first appearance (row-major scan), each
 *          with a half-open bounding box and its pixel count
 */
export function labelComponents(mask: Uint8Array, width: number, height: number): Component[] {
  const labels = new Int32Array(width * height);
  // Label 0 is background; provisional labels start at 1
  const sets = new DisjointSet(width * height + 1);
  let next = 1;

  // Pass 1: provisional labels from the already-visited neighbours
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      if (mask[i]) continue;

      let label = 0;
      const neighbours = [
        x > 0 ? labels[i - 1] : 0,
        y > 0 && x > 0 ? labels[i - width - 1] : 0,
        y > 0 ? labels[i - width] : 0,
        y > 0 && x < width - 1 ? labels[i - width + 1] : 0,
      ];
      for (const n of neighbours) {
        if (n === 0) continue;
        if (label === 0) label = n;
        else sets.union(label, n);
      }
      labels[i] = label === 0 ? next++ : label;
    }
  }

  // Pass 2: resolve roots and accumulate boxes
  const byRoot = new Map<number, Component>();
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const l = labels[y * width + x];
      if (l === 0) continue;
      const root = sets.find(l);
      const comp = byRoot.get(root);
      if (!comp) {
        byRoot.set(root, { label: byRoot.size + 1, box: { x0: x, y0: y, x1: x + 1, y1: y + 1 }, area: 1 });
        continue;
      }
      comp.area++;
      if (x < comp.box.x0) comp.box.x0 = x;
      if (x + 1 > comp.box.x1) comp.box.x1 = x + 1;
      if (y + 1 > comp.box.y1) comp.box.y1 = y + 1;
    }
  }

  return [...byRoot.values()];
}

// ============================================================================
// Clustering
// ============================================================================

function boxGap(a: BoundingBox, b: BoundingBox): { dx: number; dy: number } {
  return {
    dx: Math.max(0, Math.max(a.x0, b.x0) - Math.min(a.x1, b.x1)),
    dy: Math.max(0, Math.max(a.y0, b.y0) - Math.min(a.y1, b.y1)),
  };
}

function unionBox(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

/**
 * Merge components whose boxes lie within `proximity` pixels of each other on
 * both axes. Repeats until no pair merges, since a grown box can reach
 * neighbours the parts could not.
 */
export function mergeComponents(components: Component[], proximity: number = MERGE_PROXIMITY_PX): SpriteCluster[] {
  let clusters: SpriteCluster[] = components.map(c => ({ box: { ...c.box }, memberCount: 1, area: c.area }));

  let merged = true;
  while (merged) {
    merged = false;
    const nextClusters: SpriteCluster[] = [];
    for (const cluster of clusters) {
      const target = nextClusters.find(other => {
        const { dx, dy } = boxGap(other.box, cluster.box);
        return dx <= proximity && dy <= proximity;
      });
      if (target) {
        target.box = unionBox(target.box, cluster.box);
        target.memberCount += cluster.memberCount;
        target.area += cluster.area;
        merged = true;
      } else {
        nextClusters.push({ ...cluster, box: { ...cluster.box } });
      }
    }
    clusters = nextClusters;
  }

  return clusters;
}

/**
 * Sort clusters into reading order. A cluster joins the current row while its
 * top edge lies above the vertical midpoint of the row's first cluster.
 */
export function orderRowMajor(clusters: SpriteCluster[]): SpriteCluster[] {
  const sorted = [...clusters].sort((a, b) => a.box.y0 - b.box.y0 || a.box.x0 - b.box.x0);
  const rows: SpriteCluster[][] = [];

  for (const cluster of sorted) {
    const row = rows[rows.length - 1];
    if (row) {
      const first = row[0];
      const mid = (first.box.y0 + first.box.y1) / 2;
      if (cluster.box.y0 < mid) {
        row.push(cluster);
        continue;
      }
    }
    rows.push([cluster]);
  }

  return rows.flatMap(row => row.sort((a, b) => a.box.x0 - b.box.x0));
}

export interface LabelingOptions {
  noiseAreaThreshold?: number;
  mergeProximityPx?: number;
}

/**
 * Label, drop noise, merge and order. Returns an empty list when nothing
 * survives; the caller decides whether that is an error.
 */
export function findSpriteClusters(
  mask: Uint8Array,
  width: number,
  height: number,
  options: LabelingOptions = {}
): SpriteCluster[] {
  const { noiseAreaThreshold = NOISE_AREA_THRESHOLD, mergeProximityPx = MERGE_PROXIMITY_PX } = options;
  const components = labelComponents(mask, width, height).filter(c => c.area >= noiseAreaThreshold);
  return orderRowMajor(mergeComponents(components, mergeProximityPx));
}
