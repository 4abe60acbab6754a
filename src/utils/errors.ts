/**
 * 에러 클래스 정의
 * CLI 종료 코드 매핑 포함
 */

export const ErrorCodes = {
  USAGE: 'USAGE',
  PACKAGE_NOT_FOUND: 'PACKAGE_NOT_FOUND',
  FETCH_FAILED: 'FETCH_FAILED',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** CLI 종료 코드 */
export const ExitCodes = {
  SUCCESS: 0,
  USAGE: 1,
  UNKNOWN_PACKAGE: 2,
  FAILURE: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * 기본 에러
 */
export class DepGraphError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DepGraphError';
    this.code = code;
    this.details = details;
  }
}

export class UsageError extends DepGraphError {
  constructor(message: string) {
    super(message, ErrorCodes.USAGE);
    this.name = 'UsageError';
  }
}

/**
 * 인덱스에 없는 패키지
 */
export class LookupError extends DepGraphError {
  readonly packageName: string;
  readonly indexUrl?: string;

  constructor(packageName: string, indexUrl?: string) {
    super(
      indexUrl ? `"${packageName}" is not in ${indexUrl}.` : `Unknown package "${packageName}"`,
      ErrorCodes.PACKAGE_NOT_FOUND,
      { packageName, indexUrl }
    );
    this.name = 'LookupError';
    this.packageName = packageName;
    this.indexUrl = indexUrl;
  }

  /** 인덱스 URL을 붙인 새 에러 반환 */
  withIndexUrl(indexUrl: string): LookupError {
    return new LookupError(this.packageName, indexUrl);
  }
}

/**
 * 원격 문서 조회 실패
 */
export class FetchError extends DepGraphError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, reason: string, status?: number) {
    super(`Failed to fetch ${url}: ${reason}`, ErrorCodes.FETCH_FAILED, { url, status });
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

export class ConfigError extends DepGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * 에러를 CLI 종료 코드로 변환
 */
export function toExitCode(error: unknown): ExitCode {
  if (error instanceof UsageError) {
    return ExitCodes.USAGE;
  }
  return ExitCodes.FAILURE;
}

/**
 * unknown 값에서 메시지 추출
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
