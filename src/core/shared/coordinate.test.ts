/**
 * coordinate.ts 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import { buildCoordinate, createCoordinate, manifestUrl, resourceUrl } from './coordinate';
import { LookupError } from '../../utils/errors';
import type { PackageIndex } from '../../types';

const BASE = 'http://packages.test/dmspkgs';

describe('coordinate', () => {
  describe('resourceUrl', () => {
    it('generic 아키텍처와 최상위 디렉토리', () => {
      const coord = createCoordinate({ name: 'afw', version: '1.0', baseUrl: BASE });
      expect(resourceUrl(coord)).toBe('http://packages.test/dmspkgs/afw/1.0');
    });

    it('디렉토리가 있으면 포함', () => {
      const coord = createCoordinate({
        name: 'boost',
        version: '1.37.0',
        directory: 'external',
        baseUrl: BASE,
      });
      expect(resourceUrl(coord)).toBe('http://packages.test/dmspkgs/external/boost/1.37.0');
    });

    it('generic이 아닌 아키텍처는 마지막에 추가', () => {
      const coord = createCoordinate({
        name: 'cfitsio',
        version: '3.09',
        architecture: 'Linux64',
        directory: 'external',
        baseUrl: BASE,
      });
      expect(resourceUrl(coord)).toBe('http://packages.test/dmspkgs/external/cfitsio/3.09/Linux64');
    });

    it('baseUrl 끝의 슬래시는 중복되지 않음', () => {
      const coord = createCoordinate({ name: 'afw', version: '1.0', baseUrl: `${BASE}/` });
      expect(resourceUrl(coord)).toBe('http://packages.test/dmspkgs/afw/1.0');
    });

    it('manifest URL', () => {
      const coord = createCoordinate({ name: 'afw', version: '1.0', baseUrl: BASE });
      expect(manifestUrl(coord)).toBe('http://packages.test/dmspkgs/afw/1.0/the.manifest');
    });
  });

  describe('createCoordinate', () => {
    it('기본값 적용 및 불변 객체', () => {
      const coord = createCoordinate({ name: 'afw', version: '1.0', baseUrl: BASE });
      expect(coord.architecture).toBe('generic');
      expect(coord.directory).toBe('');
      expect(Object.isFrozen(coord)).toBe(true);
    });
  });

  describe('buildCoordinate', () => {
    const index: PackageIndex = new Map([
      ['boost', { architecture: 'generic', version: '1.37.0', directory: 'external' }],
    ]);

    it('인덱스 항목으로 좌표 생성', () => {
      expect(buildCoordinate('boost', index, BASE)).toEqual({
        name: 'boost',
        version: '1.37.0',
        architecture: 'generic',
        directory: 'external',
        baseUrl: BASE,
      });
    });

    it('인덱스에 없으면 LookupError', () => {
      expect(() => buildCoordinate('missing', index, BASE)).toThrow(LookupError);
      expect(() => buildCoordinate('missing', index, BASE)).toThrow('Unknown package "missing"');
    });
  });
});
