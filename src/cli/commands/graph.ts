import chalk from 'chalk';
import * as path from 'path';
import * as fs from 'fs-extra';
import type { DocumentFetcher } from '../../types';
import { HttpFetcher } from '../../core/shared/http-fetcher';
import { fetchPackageIndex } from '../../core/shared/index-loader';
import { ManifestResolver } from '../../core/resolver/manifestResolver';
import { renderDot } from '../../core/graph/dotRenderer';
import { getTreeStats } from '../../core/graph/tree-stats';
import { ExitCodes, UsageError, getErrorMessage, toExitCode, type ExitCode } from '../../utils/errors';
import logger from '../../utils/logger';

export const USAGE = 'Usage: eups-depgraph <pkg_name>';

// graph 옵션
export interface GraphOptions {
  baseUrl: string;
  timeout: number;
  output?: string;
  title?: string;
  verbose?: boolean;
}

/**
 * graph 명령어 핸들러
 * DOT 텍스트는 stdout(또는 --output 파일), 그 외 메시지는 stderr
 */
export async function graphCommand(
  packageName: string | undefined,
  options: GraphOptions,
  fetcher: DocumentFetcher = new HttpFetcher({ timeout: options.timeout })
): Promise<ExitCode> {
  if (!packageName) {
    const error = new UsageError(USAGE);
    console.log(error.message);
    return toExitCode(error);
  }

  try {
    const document = await fetchPackageIndex(options.baseUrl, fetcher, {
      onMalformedLine: options.verbose
        ? (line, lineNumber) => logger.warn(`Skipped malformed line: "${line}"`, { lineNumber })
        : undefined,
    });

    // 루트 패키지 확인
    if (!document.index.has(packageName)) {
      console.log(`Error: "${packageName}" is not in ${document.url}.`);
      return ExitCodes.UNKNOWN_PACKAGE;
    }

    const resolver = new ManifestResolver(fetcher, {
      onProgress: (name, expanded) => logger.debug(`Resolved ${name}`, { expanded }),
    });
    const root = await resolver.resolvePackage(packageName, document);
    logger.info('의존성 해결 완료', { packageName, ...getTreeStats(root) });

    const plot = renderDot(root, options.title ?? `Dependencies for ${packageName}`);

    if (options.output) {
      const outputPath = path.resolve(options.output);
      await fs.outputFile(outputPath, plot, 'utf8');
      console.error(chalk.green(`✓ ${outputPath}`));
    } else {
      process.stdout.write(plot);
    }

    return ExitCodes.SUCCESS;
  } catch (error) {
    console.error(chalk.red(`Error: ${getErrorMessage(error)}`));
    if (error instanceof Error) {
      logger.debug(error.stack ?? error.message);
    }
    return toExitCode(error);
  }
}
