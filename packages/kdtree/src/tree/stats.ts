import type { KdTree, TreeStats } from '../types.js';

/**
 * Count nodes and leaves and measure the depth of a built tree.
 * An empty tree has depth 0; a single leaf has depth 1.
 */
export function kdTreeStats(tree: KdTree): TreeStats {
  if (tree.root < 0) return { points: 0, nodes: 0, leaves: 0, depth: 0 };

  let leaves = 0;
  let depth = 0;
  const stack: Array<[node: number, level: number]> = [[tree.root, 1]];

  while (stack.length > 0) {
    const [index, level] = stack.pop()!;
    const node = tree.nodes[index]!;
    if (level > depth) depth = level;
    if (node.kind === 'leaf') {
      leaves++;
    } else {
      stack.push([node.left, level + 1], [node.right, level + 1]);
    }
  }

  return { points: tree.size, nodes: tree.nodes.length, leaves, depth };
}
