/**
 * Recursion detection over a function call graph
 */

/**
 * Functions that take part in a call cycle (self-recursion or mutual recursion), sorted.
 * Tarjan's strongly connected components, iterative so deep graphs do not overflow the stack.
 */
export function findRecursiveFunctions(edges: ReadonlyMap<string, ReadonlySet<string>>): string[] {
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const recursive = new Set<string>();
  let counter = 0;

  const successors = (node: string): string[] => [...(edges.get(node) ?? [])];

  for (const root of edges.keys()) {
    if (index.has(root)) continue;

    const work: Array<{ node: string; next: string[]; position: number }> = [];
    const enter = (node: string) => {
      index.set(node, counter);
      lowLink.set(node, counter);
      counter++;
      stack.push(node);
      onStack.add(node);
      work.push({ node, next: successors(node), position: 0 });
    };
    enter(root);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      if (frame.position < frame.next.length) {
        const target = frame.next[frame.position++];
        if (!index.has(target)) {
          enter(target);
        } else if (onStack.has(target)) {
          lowLink.set(frame.node, Math.min(lowLink.get(frame.node) ?? 0, index.get(target) ?? 0));
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent) {
        lowLink.set(parent.node, Math.min(lowLink.get(parent.node) ?? 0, lowLink.get(frame.node) ?? 0));
      }

      if (lowLink.get(frame.node) === index.get(frame.node)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.node);

        const selfLoop = edges.get(frame.node)?.has(frame.node) ?? false;
        if (component.length > 1 || selfLoop) {
          component.forEach((name) => recursive.add(name));
        }
      }
    }
  }

  return [...recursive].sort();
}

/**
 * Collects call references while walking, resolves them once every function is known
 */
export class CallGraphBuilder {
  private readonly functions = new Set<string>();
  private readonly references: Array<{ from: string; candidates: string[] }> = [];

  addFunction(qualifiedName: string): void {
    this.functions.add(qualifiedName);
  }

  /**
   * Record a call from `from` that may target any of `candidates`, first known one wins
   */
  addReference(from: string, candidates: string[]): void {
    this.references.push({ from, candidates });
  }

  build(): Map<string, Set<string>> {
    const edges = new Map<string, Set<string>>();
    for (const name of this.functions) edges.set(name, new Set());
    for (const { from, candidates } of this.references) {
      const target = candidates.find((candidate) => this.functions.has(candidate));
      if (target && this.functions.has(from)) {
        edges.get(from)?.add(target);
      }
    }
    return edges;
  }

  recursiveFunctions(): string[] {
    return findRecursiveFunctions(this.build());
  }
}

