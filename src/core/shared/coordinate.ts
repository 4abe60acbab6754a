/**
 * 패키지 좌표 생성 및 URL 계산
 */

import { GENERIC_ARCHITECTURE, type Coordinate, type PackageIndex } from '../../types';
import { LookupError } from '../../utils/errors';

export const MANIFEST_NAME = 'the.manifest';

/**
 * 좌표 생성 (불변)
 */
export function createCoordinate(fields: {
  name: string;
  version: string;
  baseUrl: string;
  architecture?: string;
  directory?: string;
}): Coordinate {
  return Object.freeze({
    name: fields.name,
    version: fields.version,
    architecture: fields.architecture || GENERIC_ARCHITECTURE,
    directory: fields.directory ?? '',
    baseUrl: fields.baseUrl,
  });
}

/**
 * 패키지 리소스 URL
 * 예: http://host/dmspkgs/external/cfitsio/3.09/Linux64
 */
export function resourceUrl(coordinate: Coordinate): string {
  let url = coordinate.baseUrl.replace(/\/+$/, '');
  if (coordinate.directory) {
    url += `/${coordinate.directory}`;
  }
  url += `/${coordinate.name}/${coordinate.version}`;
  if (coordinate.architecture !== GENERIC_ARCHITECTURE) {
    url += `/${coordinate.architecture}`;
  }
  return url;
}

export function manifestUrl(coordinate: Coordinate): string {
  return `${resourceUrl(coordinate)}/${MANIFEST_NAME}`;
}

/**
 * 인덱스에서 이름으로 좌표 생성
 * @throws LookupError 인덱스에 없는 이름
 */
export function buildCoordinate(name: string, index: PackageIndex, baseUrl: string): Coordinate {
  const entry = index.get(name);
  if (!entry) {
    throw new LookupError(name);
  }
  return createCoordinate({
    name,
    version: entry.version,
    architecture: entry.architecture,
    directory: entry.directory,
    baseUrl,
  });
}
