import type { DocumentFetcher } from '../types';
import { FetchError } from '../utils/errors';

/**
 * 테스트용 메모리 문서 저장소
 * 등록되지 않은 URL은 HTTP 404 FetchError
 */
export class MemoryFetcher implements DocumentFetcher {
  readonly requested: string[] = [];
  private documents = new Map<string, string[]>();

  constructor(documents: Record<string, string[]> = {}) {
    for (const [url, lines] of Object.entries(documents)) {
      this.documents.set(url, lines);
    }
  }

  set(url: string, lines: string[]): this {
    this.documents.set(url, lines);
    return this;
  }

  async fetchLines(url: string): Promise<string[]> {
    this.requested.push(url);
    const lines = this.documents.get(url);
    if (!lines) {
      throw new FetchError(url, 'HTTP 404', 404);
    }
    return [...lines];
  }
}

export const TEST_BASE_URL = 'http://packages.test/dmspkgs';

/** <base>/<name>/<version>/the.manifest (generic, 최상위) */
export function manifestAt(name: string, version: string): string {
  return `${TEST_BASE_URL}/${name}/${version}/the.manifest`;
}

/** `>merge pkg=...` 줄 목록 + `>self` */
export function manifestOf(...deps: string[]): string[] {
  return [...deps.map((dep) => `>merge pkg=${dep}`), '>self'];
}
