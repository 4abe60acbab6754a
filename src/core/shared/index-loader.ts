/**
 * 원격 current.list 조회 및 파싱
 */

import type { DocumentFetcher, IndexDocument } from '../../types';
import { CURRENT_LIST_NAME, parsePackageList, type PackageListParseOptions } from './package-list-parser';
import logger from '../../utils/logger';

export function indexUrlFor(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${CURRENT_LIST_NAME}`;
}

export async function fetchPackageIndex(
  baseUrl: string,
  fetcher: DocumentFetcher,
  options: PackageListParseOptions = {}
): Promise<IndexDocument> {
  const url = indexUrlFor(baseUrl);
  const lines = await fetcher.fetchLines(url);
  const index = parsePackageList(lines, options);

  logger.debug('패키지 목록 로드 완료', { url, packages: index.size });
  return { baseUrl, url, index };
}
