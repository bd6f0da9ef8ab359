/**
 * LinkGraph: the forest of target (parent) edges between nodes.
 *
 * Edges are held as `source key -> target key` with a reverse index
 * `target key -> source keys` for child enumeration. The single invariant is
 * acyclicity; it is enforced on every link and retarget by walking from the
 * prospective target toward its root. Roots are recomputed on each query.
 */

import type { EdgeRecord, NodeKey, NodeRef } from '../models/node.js';
import { CompositionError } from '../utils/errors.js';
import { MAX_ROOT_DEPTH } from '../utils/constants.js';
import { canonicalNode, compareNodes, formatNode, nodeKey, parseNodeKey } from './nodeRegistry.js';

export interface LinkGraphOptions {
  /** Longest target walk tolerated before the graph is declared corrupted. */
  maxDepth?: number;
}

export class LinkGraph {
  private targets = new Map<NodeKey, NodeKey>();
  private children = new Map<NodeKey, Set<NodeKey>>();
  readonly maxDepth: number;

  constructor(options: LinkGraphOptions = {}) {
    this.maxDepth = options.maxDepth ?? MAX_ROOT_DEPTH;
    if (!Number.isInteger(this.maxDepth) || this.maxDepth < 1) {
      throw new Error(`maxDepth must be a positive integer, got ${this.maxDepth}`);
    }
  }

  /**
   * Rebuild a graph from persisted edges without re-validating them, so that a
   * corrupted file surfaces through `verify()` and `findRoot()` instead of being
   * silently repaired.
   */
  static fromEdges(edges: EdgeRecord[], options: LinkGraphOptions = {}): LinkGraph {
    const graph = new LinkGraph(options);
    for (const edge of edges) {
      graph.insert(nodeKey(edge.source), nodeKey(edge.target));
    }
    return graph;
  }

  /** Check every precondition of `link` without mutating. */
  validateLink(source: NodeRef, target: NodeRef): void {
    const s = nodeKey(source);
    const t = nodeKey(target);
    if (s === t) {
      throw new CompositionError('SelfLink', `Cannot link ${formatNode(source)} to itself`);
    }
    const existing = this.targets.get(s);
    if (existing !== undefined) {
      throw new CompositionError(
        'AlreadyLinked',
        `${formatNode(source)} is already linked to ${existing}; use updateTarget to re-parent it`,
      );
    }
    this.assertNoCycle(s, t);
  }

  link(source: NodeRef, target: NodeRef): void {
    this.validateLink(source, target);
    this.insert(nodeKey(source), nodeKey(target));
  }

  /** Check every precondition of `updateTarget` without mutating. */
  validateUpdateTarget(source: NodeRef, newTarget: NodeRef): void {
    const s = nodeKey(source);
    const t = nodeKey(newTarget);
    if (!this.targets.has(s)) {
      throw new CompositionError('NotLinked', `${formatNode(source)} has no target; use link instead`);
    }
    if (s === t) {
      throw new CompositionError('SelfLink', `Cannot link ${formatNode(source)} to itself`);
    }
    // The old edge is never followed: the walk stops as soon as it reaches `s`.
    this.assertNoCycle(s, t);
  }

  /** Replace the target of a linked node. Returns the previous target. */
  updateTarget(source: NodeRef, newTarget: NodeRef): NodeRef {
    this.validateUpdateTarget(source, newTarget);
    const s = nodeKey(source);
    const previous = this.targets.get(s);
    if (previous === undefined) {
      throw new CompositionError('NotLinked', `${formatNode(source)} has no target`);
    }
    this.remove(s, previous);
    this.insert(s, nodeKey(newTarget));
    return parseNodeKey(previous);
  }

  /** Remove the target edge of a node. Returns the previous target. */
  unlink(source: NodeRef): NodeRef {
    const s = nodeKey(source);
    const previous = this.targets.get(s);
    if (previous === undefined) {
      throw new CompositionError('NotLinked', `${formatNode(source)} has no target`);
    }
    this.remove(s, previous);
    return parseNodeKey(previous);
  }

  getTarget(node: NodeRef): NodeRef | null {
    const target = this.targets.get(nodeKey(node));
    return target === undefined ? null : parseNodeKey(target);
  }

  isLinked(node: NodeRef): boolean {
    return this.targets.has(nodeKey(node));
  }

  /** Follow target edges until a node without one is reached. */
  findRoot(node: NodeRef): NodeRef {
    const start = nodeKey(node);
    let current = start;
    for (let steps = 0; steps <= this.maxDepth; steps++) {
      const next = this.targets.get(current);
      if (next === undefined) {
        return current === start ? canonicalNode(node) : parseNodeKey(current);
      }
      current = next;
    }
    throw this.corrupted(start);
  }

  /** Number of edges between a node and its root. */
  depthOf(node: NodeRef): number {
    const start = nodeKey(node);
    let current = start;
    for (let depth = 0; depth <= this.maxDepth; depth++) {
      const next = this.targets.get(current);
      if (next === undefined) return depth;
      current = next;
    }
    throw this.corrupted(start);
  }

  /** Direct children (nodes whose target is `node`), ordered by collection then token id. */
  childrenOf(node: NodeRef): NodeRef[] {
    const set = this.children.get(nodeKey(node));
    if (!set) return [];
    return [...set].map(parseNodeKey).sort(compareNodes);
  }

  edges(): EdgeRecord[] {
    return [...this.targets].map(([source, target]) => ({
      source: parseNodeKey(source),
      target: parseNodeKey(target),
    }));
  }

  get size(): number {
    return this.targets.size;
  }

  /**
   * Audit the whole forest using DFS with 3-color marking along target edges.
   * Returns the keys of every node that lies on a cycle or whose walk runs into one.
   */
  verify(): NodeKey[] {
    const WHITE = 0;
    const GRAY = 1;
    const BLACK = 2;
    const color = new Map<NodeKey, number>();
    const broken = new Set<NodeKey>();

    for (const start of this.targets.keys()) {
      if ((color.get(start) ?? WHITE) !== WHITE) continue;
      const path: NodeKey[] = [];
      let current: NodeKey | undefined = start;
      let reachesCycle = false;
      while (current !== undefined) {
        const c = color.get(current) ?? WHITE;
        if (c === GRAY) {
          reachesCycle = true;
          break;
        }
        if (c === BLACK) {
          reachesCycle = broken.has(current);
          break;
        }
        color.set(current, GRAY);
        path.push(current);
        current = this.targets.get(current);
      }
      for (const key of path) {
        color.set(key, BLACK);
        if (reachesCycle) broken.add(key);
      }
    }
    return [...broken].sort();
  }

  /** Walk from `target` toward its root; reaching `source` means the edge would close a cycle. */
  private assertNoCycle(source: NodeKey, target: NodeKey): void {
    let current = target;
    for (let steps = 0; steps <= this.maxDepth; steps++) {
      if (current === source) {
        throw new CompositionError(
          'CycleDetected',
          `Linking ${source} to ${target} would create a cycle`,
        );
      }
      const next = this.targets.get(current);
      if (next === undefined) return;
      current = next;
    }
    throw this.corrupted(target);
  }

  private corrupted(start: NodeKey): CompositionError {
    return new CompositionError(
      'GraphCorrupted',
      `Target walk from ${start} exceeded ${this.maxDepth} steps`,
    );
  }

  private insert(source: NodeKey, target: NodeKey): void {
    this.targets.set(source, target);
    let set = this.children.get(target);
    if (!set) {
      set = new Set();
      this.children.set(target, set);
    }
    set.add(source);
  }

  private remove(source: NodeKey, target: NodeKey): void {
    this.targets.delete(source);
    const set = this.children.get(target);
    if (!set) return;
    set.delete(source);
    if (set.size === 0) this.children.delete(target);
  }
}
