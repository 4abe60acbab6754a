import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ExitCodes,
  FetchError,
  LookupError,
  UsageError,
  getErrorMessage,
  toExitCode,
} from './errors';

describe('errors', () => {
  it('LookupError 메시지에 이름과 인덱스 URL 포함', () => {
    const error = new LookupError('afw').withIndexUrl('http://packages.test/current.list');

    expect(error.message).toBe('"afw" is not in http://packages.test/current.list.');
    expect(error.code).toBe('PACKAGE_NOT_FOUND');
    expect(error.details).toEqual({
      packageName: 'afw',
      indexUrl: 'http://packages.test/current.list',
    });
  });

  it('FetchError 필드', () => {
    const error = new FetchError('http://packages.test/x', 'HTTP 500', 500);

    expect(error.message).toBe('Failed to fetch http://packages.test/x: HTTP 500');
    expect(error.status).toBe(500);
    expect(error.name).toBe('FetchError');
  });

  it('종료 코드 매핑', () => {
    expect(toExitCode(new UsageError('Usage: eups-depgraph <pkg_name>'))).toBe(ExitCodes.USAGE);
    expect(toExitCode(new FetchError('u', 'x'))).toBe(ExitCodes.FAILURE);
    expect(toExitCode(new LookupError('a'))).toBe(ExitCodes.FAILURE);
    expect(toExitCode(new ConfigError('bad'))).toBe(ExitCodes.FAILURE);
  });

  it('getErrorMessage', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
  });
});
