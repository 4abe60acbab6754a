/**
 * EUPS 패키지 목록(current.list) 파싱
 *
 * 형식:
 *   EUPS distribution ...        (선택적 제목 줄)
 *   # comment
 *   <name> <arch> <version> [<directory>]
 */

import type { IndexEntry, PackageIndex } from '../../types';

export const LIST_TITLE_MARKER = 'EUPS distribution';
export const CURRENT_LIST_NAME = 'current.list';

export interface PackageListParseOptions {
  /** 형식이 맞지 않는 줄 콜백 */
  onMalformedLine?: (line: string, lineNumber: number) => void;
}

/**
 * 줄 목록을 이름 → 인덱스 항목 맵으로 변환
 * 같은 이름이 여러 번 나오면 마지막 줄이 남는다.
 */
export function parsePackageList(
  lines: readonly string[],
  options: PackageListParseOptions = {}
): PackageIndex {
  const index: PackageIndex = new Map();
  const start = lines.length > 0 && lines[0].startsWith(LIST_TITLE_MARKER) ? 1 : 0;

  for (let i = start; i < lines.length; i++) {
    const line = lines[i];
    if (line.startsWith('#')) {
      continue;
    }

    const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
    if (tokens.length === 0) {
      continue;
    }

    let entry: IndexEntry;
    if (tokens.length === 4) {
      entry = { architecture: tokens[1], version: tokens[2], directory: tokens[3] };
    } else if (tokens.length === 3) {
      entry = { architecture: tokens[1], version: tokens[2], directory: '' };
    } else {
      options.onMalformedLine?.(line.trim(), i + 1);
      continue;
    }

    index.set(tokens[0], entry);
  }

  return index;
}
