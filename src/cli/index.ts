#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { getConfigManager, type Config } from '../core/config';
import { ExitCodes, getErrorMessage, type ExitCode } from '../utils/errors';
import logger from '../utils/logger';

// 버전 정보
const VERSION = '1.0.0';

interface RootOptions {
  baseUrl?: string;
  timeout?: number;
  output?: string;
  title?: string;
  verbose?: boolean;
}

function parseTimeoutOption(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('양의 정수(ms)를 입력하세요.');
  }
  return timeout;
}

function loadConfig(): Config {
  return getConfigManager().getConfig();
}

function finish(code: ExitCode): void {
  process.exitCode = code;
}

// 메인 프로그램
const program = new Command();

program
  .name('eups-depgraph')
  .description('EUPS 패키지 의존성 그래프를 Graphviz DOT 형식으로 출력')
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .argument('[package]', '패키지명 (current.list 기준)')
  .option('-u, --base-url <url>', '저장소 루트 URL')
  .option('-t, --timeout <ms>', '요청 타임아웃 (ms)', parseTimeoutOption)
  .option('-o, --output <file>', 'stdout 대신 파일로 저장')
  .option('--title <title>', '그래프 제목')
  .option('--verbose', '상세 로그 출력')
  .action(async (packageName: string | undefined, options: RootOptions) => {
    const config = loadConfig();
    await logger.initialize({
      level: options.verbose ? 'debug' : config.logLevel,
      logToFile: config.logToFile,
    });

    const { graphCommand } = await import('./commands/graph');
    finish(
      await graphCommand(packageName, {
        baseUrl: options.baseUrl ?? config.baseUrl,
        timeout: options.timeout ?? config.timeout,
        output: options.output,
        title: options.title,
        verbose: options.verbose,
      })
    );
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        finish(await configGet(key));
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        finish(await configSet(key, value));
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        finish(await configList());
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        finish(await configReset());
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(ExitCodes.USAGE);
});

// 파싱 및 실행
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${getErrorMessage(error)}`));
  process.exit(ExitCodes.FAILURE);
});
