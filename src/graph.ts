/**
 * Directed file-to-file reference graph. Nodes are file paths, an edge
 * means the source file holds at least one resolved link to the target.
 */
export class ReferenceGraph {
  private outEdges = new Map<string, Set<string>>();
  private inEdges = new Map<string, Set<string>>();

  addNode(path: string): void {
    if (!this.outEdges.has(path)) this.outEdges.set(path, new Set());
    if (!this.inEdges.has(path)) this.inEdges.set(path, new Set());
  }

  /** Self references (anchor-only links) are not edges. */
  addEdge(source: string, target: string): void {
    if (source === target) return;
    this.addNode(source);
    this.addNode(target);
    this.outEdges.get(source)?.add(target);
    this.inEdges.get(target)?.add(source);
  }

  nodes(): string[] {
    return Array.from(this.outEdges.keys()).sort();
  }

  edgeCount(): number {
    let count = 0;
    for (const targets of this.outEdges.values()) count += targets.size;
    return count;
  }

  outgoing(path: string): string[] {
    return Array.from(this.outEdges.get(path) ?? []).sort();
  }

  incoming(path: string): string[] {
    return Array.from(this.inEdges.get(path) ?? []).sort();
  }

  /** Files no other file links to. */
  orphans(): string[] {
    return this.nodes().filter((node) => (this.inEdges.get(node)?.size ?? 0) === 0);
  }

  /**
   * Groups of files that reach each other through links (strongly
   * connected components with more than one member), via Tarjan's algorithm.
   */
  cycles(): string[][] {
    let counter = 0;
    const indices = new Map<string, number>();
    const lowLinks = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const components: string[][] = [];

    const visit = (node: string): void => {
      indices.set(node, counter);
      lowLinks.set(node, counter);
      counter++;
      stack.push(node);
      onStack.add(node);

      for (const next of this.outgoing(node)) {
        if (!indices.has(next)) {
          visit(next);
          lowLinks.set(node, Math.min(lowLinks.get(node) ?? 0, lowLinks.get(next) ?? 0));
        } else if (onStack.has(next)) {
          lowLinks.set(node, Math.min(lowLinks.get(node) ?? 0, indices.get(next) ?? 0));
        }
      }

      if (lowLinks.get(node) === indices.get(node)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== node);
        if (component.length > 1) components.push(component.sort());
      }
    };

    for (const node of this.nodes()) {
      if (!indices.has(node)) visit(node);
    }

    return components.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  }
}
