/**
 * HTTP 문서 조회
 * 원격 텍스트 문서를 줄 단위로 반환 (재시도 없음)
 */

import axios from 'axios';
import type { DocumentFetcher } from '../../types';
import { FetchError, getErrorMessage } from '../../utils/errors';
import logger from '../../utils/logger';

export interface HttpFetcherOptions {
  /** 요청 타임아웃 (ms) */
  timeout?: number;
}

/**
 * 텍스트를 줄로 분리 (마지막 개행 뒤의 빈 줄은 제외)
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export class HttpFetcher implements DocumentFetcher {
  private readonly timeout: number;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeout = options.timeout ?? 30000;
  }

  async fetchLines(url: string): Promise<string[]> {
    logger.debug('문서 요청', { url });

    try {
      const response = await axios.get<string>(url, {
        timeout: this.timeout,
        responseType: 'text',
        headers: {
          'User-Agent': 'eups-depgraph',
        },
      });
      return splitLines(typeof response.data === 'string' ? response.data : String(response.data));
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined) {
          throw new FetchError(url, `HTTP ${status}`, status);
        }
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new FetchError(url, `timeout after ${this.timeout}ms`);
        }
      }
      throw new FetchError(url, getErrorMessage(error));
    }
  }
}
