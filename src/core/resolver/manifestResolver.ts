/**
 * EUPS manifest 의존성 해결기
 *
 * 핵심 알고리즘:
 * 1. 패키지의 the.manifest를 받아 >merge 의존성 목록을 얻는다
 * 2. 선언된 모든 의존성에 대해 자식 노드를 만든다 (이미 방문한 패키지 포함)
 * 3. 방문 표시 후, 아직 방문하지 않은 자식만 깊이 우선으로 확장한다
 *
 * 여러 경로로 도달하는 패키지는 처음 도달한 위치에서만 확장되고
 * 나머지 위치에는 자식이 없는 노드로 남는다.
 * 재귀 대신 명시적 스택을 사용하며, 요청 순서는 재귀 정의와 같다.
 */

import type {
  Coordinate,
  DependencyNode,
  DocumentFetcher,
  IndexDocument,
  PackageIndex,
  ResolverOptions,
} from '../../types';
import { buildCoordinate, manifestUrl } from '../shared/coordinate';
import { parseManifest } from '../shared/manifest-parser';
import { LookupError } from '../../utils/errors';
import logger from '../../utils/logger';

// 확장 중인 노드와 다음에 볼 자식 위치
interface Frame {
  node: DependencyNode;
  nextChild: number;
}

export class ManifestResolver {
  private readonly fetcher: DocumentFetcher;
  private readonly options: ResolverOptions;

  constructor(fetcher: DocumentFetcher, options: ResolverOptions = {}) {
    this.fetcher = fetcher;
    this.options = options;
  }

  /**
   * 이름으로 의존성 트리 생성
   * 루트가 인덱스에 없으면 요청 없이 LookupError
   */
  async resolvePackage(packageName: string, document: IndexDocument): Promise<DependencyNode> {
    if (!document.index.has(packageName)) {
      throw new LookupError(packageName, document.url);
    }

    const root = buildCoordinate(packageName, document.index, document.baseUrl);
    try {
      return await this.resolve(root, document.index);
    } catch (error) {
      if (error instanceof LookupError && !error.indexUrl) {
        throw error.withIndexUrl(document.url);
      }
      throw error;
    }
  }

  /**
   * 좌표에서 시작해 전체 트리 생성
   */
  async resolve(root: Coordinate, index: PackageIndex): Promise<DependencyNode> {
    // 호출마다 새로 생성 (호출 간 공유 금지)
    const visited = new Set<string>();
    const rootNode: DependencyNode = { coordinate: root, children: [] };

    await this.expand(rootNode, index, visited);
    const stack: Frame[] = [{ node: rootNode, nextChild: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.nextChild >= frame.node.children.length) {
        stack.pop();
        continue;
      }

      const child = frame.node.children[frame.nextChild];
      frame.nextChild++;

      // 형제의 하위 트리가 끝난 시점에 방문 여부 확인
      if (visited.has(child.coordinate.name)) {
        continue;
      }

      await this.expand(child, index, visited);
      stack.push({ node: child, nextChild: 0 });
    }

    logger.debug('의존성 트리 생성 완료', { root: root.name, expanded: visited.size });
    return rootNode;
  }

  /**
   * 노드 하나 확장: manifest 조회 → 자식 연결 → 방문 표시
   */
  private async expand(
    node: DependencyNode,
    index: PackageIndex,
    visited: Set<string>
  ): Promise<void> {
    const { coordinate } = node;
    const lines = await this.fetcher.fetchLines(manifestUrl(coordinate));
    const dependencyNames = parseManifest(lines);

    node.children = dependencyNames.map((name) => ({
      coordinate: buildCoordinate(name, index, coordinate.baseUrl),
      children: [],
    }));

    visited.add(coordinate.name);
    logger.debug(`Expanded ${coordinate.name}`, {
      version: coordinate.version,
      dependencies: dependencyNames,
    });
    this.options.onProgress?.(coordinate.name, visited.size);
  }
}
