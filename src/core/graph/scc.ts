/**
 * Strongly connected components using Tarjan's algorithm.
 * Iterative, so deep import chains cannot overflow the call stack.
 */

/**
 * @param adjacency - Successor indices per node
 * @returns Components in completion order; members in discovery order
 */
export function findStronglyConnectedComponents(adjacency: readonly (readonly number[])[]): number[][] {
  const nodeCount = adjacency.length;
  const index = new Array<number>(nodeCount).fill(-1);
  const lowlink = new Array<number>(nodeCount).fill(0);
  const onStack = new Array<boolean>(nodeCount).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];
  let currentIndex = 0;

  for (let root = 0; root < nodeCount; root++) {
    if (index[root] !== -1) continue;

    // Explicit DFS frames: [node, next successor position]
    const frames: Array<[number, number]> = [[root, 0]];
    index[root] = lowlink[root] = currentIndex++;
    stack.push(root);
    onStack[root] = true;

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const [node, position] = frame;
      const successors = adjacency[node] ?? [];

      if (position < successors.length) {
        frame[1] = position + 1;
        const next = successors[position];
        if (index[next] === -1) {
          index[next] = lowlink[next] = currentIndex++;
          stack.push(next);
          onStack[next] = true;
          frames.push([next, 0]);
        } else if (onStack[next]) {
          lowlink[node] = Math.min(lowlink[node], index[next]);
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) {
        lowlink[parent[0]] = Math.min(lowlink[parent[0]], lowlink[node]);
      }

      if (lowlink[node] === index[node]) {
        const component: number[] = [];
        let member: number | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack[member] = false;
          component.push(member);
        } while (member !== node);
        components.push(component.reverse());
      }
    }
  }

  return components;
}
