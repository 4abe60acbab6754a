// ============================================
// 패키지 좌표 관련 타입
// ============================================

/** 아키텍처 미지정 시 기본값 */
export const GENERIC_ARCHITECTURE = 'generic';

/** 인덱스 한 줄에서 얻은 패키지 정보 */
export interface IndexEntry {
  architecture: string;
  version: string;
  /** 하위 디렉토리 (예: 'external'), 최상위는 빈 문자열 */
  directory: string;
}

/** 패키지 이름 → 인덱스 항목 */
export type PackageIndex = Map<string, IndexEntry>;

/** 원격 저장소에서 패키지 하나를 식별하는 좌표 */
export interface Coordinate {
  readonly name: string;
  readonly version: string;
  readonly architecture: string;
  readonly directory: string;
  readonly baseUrl: string;
}

/** 파싱된 인덱스와 그 출처 URL */
export interface IndexDocument {
  /** 저장소 루트 URL */
  baseUrl: string;
  /** current.list URL */
  url: string;
  index: PackageIndex;
}

// ============================================
// 의존성 관련 타입
// ============================================

/** 의존성 트리 노드 */
export interface DependencyNode {
  coordinate: Coordinate;
  /** 직접 의존성 (manifest 선언 순서) */
  children: DependencyNode[];
}

/** 트리 통계 */
export interface TreeStats {
  totalNodes: number;
  distinctPackages: number;
  edgeCount: number;
  maxDepth: number;
}

// ============================================
// 원격 문서 조회
// ============================================

/** URL의 텍스트 문서를 줄 단위로 가져오는 인터페이스 */
export interface DocumentFetcher {
  fetchLines(url: string): Promise<string[]>;
}

/** 의존성 해결기 옵션 */
export interface ResolverOptions {
  /** 패키지 하나를 확장할 때마다 호출 */
  onProgress?: (packageName: string, expanded: number) => void;
}
