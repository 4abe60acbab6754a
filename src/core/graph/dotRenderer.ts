/**
 * Graphviz DOT 렌더러
 *
 * 노드 선언은 트리 위치마다 출력되므로 같은 패키지가 여러 번 선언될 수 있다.
 * (Graphviz가 이름으로 합친다)
 */

import type { DependencyNode } from '../../types';

export const DEFAULT_TITLE = 'Created by eups-depgraph';

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function nodeDeclaration(name: string): string {
  return `  ${quote(name)} [label = "{<head> ${name} | <end>}"\n     shape = "record"];\n`;
}

function edgeDeclaration(from: string, to: string): string {
  return `  ${quote(from)}:head -> ${quote(to)}:end [id = 0];\n`;
}

/**
 * 의존성 트리를 DOT 텍스트로 변환
 */
export function renderDot(root: DependencyNode, title: string = DEFAULT_TITLE): string {
  let plot = '';

  plot += `digraph ${quote(title)} {\n`;
  plot += ' graph [rankdir = "BT"];\n';
  plot += nodeDeclaration(root.coordinate.name);

  // 전위 순회: 자식 선언/엣지 출력 후 자식 순서대로 하위 트리
  const stack: DependencyNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    const from = node.coordinate.name;
    for (const child of node.children) {
      plot += nodeDeclaration(child.coordinate.name);
      plot += edgeDeclaration(from, child.coordinate.name);
    }
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }

  plot += '}\n';
  return plot;
}
