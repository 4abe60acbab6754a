import type { DependencyNode, TreeStats } from '../../types';

/**
 * 트리 통계 (중복 위치 포함 노드 수, 고유 패키지 수, 엣지 수, 최대 깊이)
 */
export function getTreeStats(root: DependencyNode): TreeStats {
  const names = new Set<string>();
  let totalNodes = 0;
  let edgeCount = 0;
  let maxDepth = 0;

  const stack: Array<{ node: DependencyNode; depth: number }> = [{ node: root, depth: 0 }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    const { node, depth } = entry;
    totalNodes++;
    names.add(node.coordinate.name);
    edgeCount += node.children.length;
    maxDepth = Math.max(maxDepth, depth);

    for (const child of node.children) {
      stack.push({ node: child, depth: depth + 1 });
    }
  }

  return {
    totalNodes,
    distinctPackages: names.size,
    edgeCount,
    maxDepth,
  };
}
