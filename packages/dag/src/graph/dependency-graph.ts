/**
 * Dependency Graph
 *
 * Minimal directed graph over job names. An edge `from -> to` means `to`
 * needs `from` to finish first. Forward adjacency answers successor
 * queries, reverse adjacency answers predecessor and ancestor queries.
 *
 * Node, successor and predecessor order is insertion order, so every
 * traversal below is deterministic for a given construction sequence.
 */

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
}

export class DependencyGraph {
  private readonly successorsByNode = new Map<string, Set<string>>();
  private readonly predecessorsByNode = new Map<string, Set<string>>();
  private readonly order = new Map<string, number>();

  addNode(name: string): void {
    if (this.successorsByNode.has(name)) {
      return;
    }
    this.order.set(name, this.order.size);
    this.successorsByNode.set(name, new Set());
    this.predecessorsByNode.set(name, new Set());
  }

  /**
   * @throws {Error} When either endpoint is not a node
   */
  addEdge(from: string, to: string): void {
    const targets = this.successorsByNode.get(from);
    const sources = this.predecessorsByNode.get(to);
    if (!targets || !sources) {
      throw new Error(`Cannot add edge ${from} -> ${to}: unknown node '${targets ? to : from}'`);
    }
    targets.add(to);
    sources.add(from);
  }

  hasNode(name: string): boolean {
    return this.successorsByNode.has(name);
  }

  hasEdge(from: string, to: string): boolean {
    return this.successorsByNode.get(from)?.has(to) ?? false;
  }

  get nodes(): string[] {
    return [...this.successorsByNode.keys()];
  }

  get size(): number {
    return this.successorsByNode.size;
  }

  edges(): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const [from, targets] of this.successorsByNode) {
      for (const to of targets) {
        edges.push({ from, to });
      }
    }
    return edges;
  }

  successors(name: string): string[] {
    return [...(this.successorsByNode.get(name) ?? [])];
  }

  predecessors(name: string): string[] {
    return [...(this.predecessorsByNode.get(name) ?? [])];
  }

  outDegree(name: string): number {
    return this.successorsByNode.get(name)?.size ?? 0;
  }

  inDegree(name: string): number {
    return this.predecessorsByNode.get(name)?.size ?? 0;
  }

  /**
   * Position of a node in insertion order, -1 when absent
   */
  indexOf(name: string): number {
    return this.order.get(name) ?? -1;
  }

  /**
   * Every node that can reach `name`, excluding `name` itself
   */
  ancestors(name: string): Set<string> {
    return this.reach(name, this.predecessorsByNode);
  }

  /**
   * Every node reachable from `name`, excluding `name` itself
   */
  descendants(name: string): Set<string> {
    return this.reach(name, this.successorsByNode);
  }

  /**
   * Kahn-style generation peeling: each generation holds the nodes whose
   * predecessors all sit in earlier generations. Members of a generation
   * keep insertion order.
   *
   * @returns The generations, or null when the graph has a cycle
   */
  topologicalGenerations(): string[][] | null {
    const indegree = new Map<string, number>();
    for (const [name, sources] of this.predecessorsByNode) {
      indegree.set(name, sources.size);
    }

    const generations: string[][] = [];
    let current = this.nodes.filter((name) => indegree.get(name) === 0);
    let placed = 0;

    while (current.length > 0) {
      generations.push(current);
      placed += current.length;

      const next: string[] = [];
      for (const name of current) {
        for (const target of this.successorsByNode.get(name) ?? []) {
          const remaining = (indegree.get(target) ?? 0) - 1;
          indegree.set(target, remaining);
          if (remaining === 0) {
            next.push(target);
          }
        }
      }
      current = next.sort((a, b) => this.indexOf(a) - this.indexOf(b));
    }

    return placed === this.size ? generations : null;
  }

  isAcyclic(): boolean {
    return this.topologicalGenerations() !== null;
  }

  /**
   * Enumerate every simple cycle.
   *
   * Each cycle is searched from its earliest member (by insertion order)
   * through nodes that come later, with an on-path marker set, so it is
   * reported exactly once and rotated to start at that member. A
   * self-loop is a one-member cycle. The walk keeps its own frame stack,
   * so path length is not bounded by the call stack.
   */
  simpleCycles(): string[][] {
    const cycles: string[][] = [];

    for (const start of this.nodes) {
      const startIndex = this.indexOf(start);
      const path: string[] = [start];
      const onPath = new Set<string>([start]);
      const frames: Array<{ successors: string[]; next: number }> = [
        { successors: this.successors(start), next: 0 },
      ];

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        if (frame.next >= frame.successors.length) {
          frames.pop();
          const left = path.pop();
          if (left !== undefined) {
            onPath.delete(left);
          }
          continue;
        }

        const next = frame.successors[frame.next];
        frame.next += 1;
        if (next === start) {
          cycles.push([...path]);
          continue;
        }
        if (this.indexOf(next) < startIndex || onPath.has(next)) {
          continue;
        }
        onPath.add(next);
        path.push(next);
        frames.push({ successors: this.successors(next), next: 0 });
      }
    }

    return cycles;
  }

  private reach(name: string, adjacency: Map<string, Set<string>>): Set<string> {
    const seen = new Set<string>();
    const queue = [...(adjacency.get(name) ?? [])];

    while (queue.length > 0) {
      const current = queue.pop();
      if (current === undefined || seen.has(current)) {
        continue;
      }
      seen.add(current);
      for (const next of adjacency.get(current) ?? []) {
        if (!seen.has(next)) {
          queue.push(next);
        }
      }
    }

    seen.delete(name);
    return seen;
  }
}
