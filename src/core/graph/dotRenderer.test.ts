/**
 * dotRenderer.ts 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import { renderDot, DEFAULT_TITLE } from './dotRenderer';
import { createCoordinate } from '../shared/coordinate';
import type { DependencyNode } from '../../types';

function node(name: string, ...children: DependencyNode[]): DependencyNode {
  return {
    coordinate: createCoordinate({ name, version: '1.0', baseUrl: 'http://packages.test' }),
    children,
  };
}

const decl = (name: string) => `  "${name}" [label = "{<head> ${name} | <end>}"\n     shape = "record"];\n`;
const edge = (from: string, to: string) => `  "${from}":head -> "${to}":end [id = 0];\n`;

describe('renderDot', () => {
  it('루트 하나와 자식 하나', () => {
    const plot = renderDot(node('afw', node('foo')), 'Dependencies for afw');

    expect(plot).toBe(
      'digraph "Dependencies for afw" {\n' +
        ' graph [rankdir = "BT"];\n' +
        decl('afw') +
        decl('foo') +
        edge('afw', 'foo') +
        '}\n'
    );
  });

  it('자식 선언/엣지 후 하위 트리를 순서대로 출력', () => {
    // a(b(d(e)) c(d))
    const root = node('a', node('b', node('d', node('e'))), node('c', node('d')));

    expect(renderDot(root, 'T')).toBe(
      'digraph "T" {\n' +
        ' graph [rankdir = "BT"];\n' +
        decl('a') +
        decl('b') +
        edge('a', 'b') +
        decl('c') +
        edge('a', 'c') +
        decl('d') +
        edge('b', 'd') +
        decl('e') +
        edge('d', 'e') +
        decl('d') +
        edge('c', 'd') +
        '}\n'
    );
  });

  it('자식이 없는 루트', () => {
    expect(renderDot(node('solo'))).toBe(
      `digraph "${DEFAULT_TITLE}" {\n graph [rankdir = "BT"];\n${decl('solo')}}\n`
    );
  });

  it('제목의 따옴표 이스케이프', () => {
    expect(renderDot(node('x'), 'say "hi"').split('\n')[0]).toBe('digraph "say \\"hi\\"" {');
  });
});
