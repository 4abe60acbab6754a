/**
 * 패키지 manifest 파싱
 *
 *   >merge pkg=<name> ...
 *   >self
 */

const MERGE_DIRECTIVE = '>merge';
const PKG_KEY = 'pkg=';

/**
 * 의존성 패키지 이름 목록 (선언 순서, 중복 유지)
 */
export function parseManifest(lines: readonly string[]): string[] {
  const names: string[] = [];

  for (const line of lines) {
    if (!line.startsWith(MERGE_DIRECTIVE)) {
      continue;
    }

    const keyIndex = line.indexOf(PKG_KEY);
    if (keyIndex === -1) {
      continue;
    }

    const match = /^\S*/.exec(line.slice(keyIndex + PKG_KEY.length));
    const name = match ? match[0] : '';
    if (name) {
      names.push(name);
    }
  }

  return names;
}
