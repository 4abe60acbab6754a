/**
 * http-fetcher.ts 단위 테스트
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { HttpFetcher, splitLines } from './http-fetcher';
import { FetchError } from '../../utils/errors';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const URL = 'http://packages.test/dmspkgs/current.list';

describe('http-fetcher', () => {
  describe('splitLines', () => {
    it('마지막 개행 뒤의 빈 줄 제외', () => {
      expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    });

    it('CRLF 처리', () => {
      expect(splitLines('a\r\nb')).toEqual(['a', 'b']);
    });

    it('중간의 빈 줄은 유지', () => {
      expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
    });

    it('빈 문자열', () => {
      expect(splitLines('')).toEqual([]);
    });
  });

  describe('HttpFetcher', () => {
    beforeEach(() => {
      vi.clearAllMocks();
    });

    it('텍스트 응답을 줄 목록으로 반환', async () => {
      mockedAxios.get.mockResolvedValueOnce({ data: 'EUPS distribution\nafw generic 1.0\n' } as never);

      const fetcher = new HttpFetcher({ timeout: 5000 });
      const lines = await fetcher.fetchLines(URL);

      expect(lines).toEqual(['EUPS distribution', 'afw generic 1.0']);
      expect(mockedAxios.get).toHaveBeenCalledWith(
        URL,
        expect.objectContaining({ timeout: 5000, responseType: 'text' })
      );
    });

    it('기본 타임아웃 30000ms', async () => {
      mockedAxios.get.mockResolvedValueOnce({ data: '' } as never);

      await new HttpFetcher().fetchLines(URL);

      expect(mockedAxios.get).toHaveBeenCalledWith(URL, expect.objectContaining({ timeout: 30000 }));
    });

    it('HTTP 오류 상태는 FetchError (status 포함)', async () => {
      mockedAxios.get.mockRejectedValueOnce({ response: { status: 404 }, message: 'Not Found' });
      mockedAxios.isAxiosError.mockReturnValue(true);

      const error = await new HttpFetcher().fetchLines(URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({
        url: URL,
        status: 404,
        message: `Failed to fetch ${URL}: HTTP 404`,
      });
    });

    it('타임아웃은 FetchError', async () => {
      mockedAxios.get.mockRejectedValueOnce({ code: 'ECONNABORTED', message: 'timeout of 100ms exceeded' });
      mockedAxios.isAxiosError.mockReturnValue(true);

      await expect(new HttpFetcher({ timeout: 100 }).fetchLines(URL)).rejects.toThrow(
        `Failed to fetch ${URL}: timeout after 100ms`
      );
    });

    it('네트워크 오류는 FetchError', async () => {
      mockedAxios.get.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND packages.test'));
      mockedAxios.isAxiosError.mockReturnValue(false);

      await expect(new HttpFetcher().fetchLines(URL)).rejects.toThrow(
        `Failed to fetch ${URL}: getaddrinfo ENOTFOUND packages.test`
      );
    });
  });
});
