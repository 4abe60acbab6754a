import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, type Config } from '../../core/config';
import { ExitCodes, getErrorMessage, type ExitCode } from '../../utils/errors';

const descriptions: Record<keyof Config, string> = {
  baseUrl: '저장소 루트 URL',
  timeout: '요청 타임아웃 (ms)',
  logLevel: '로그 레벨',
  logToFile: '파일 로그 사용 여부',
};

/**
 * 문자열 값 파싱 (숫자, 불리언, 문자열)
 */
export function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<ExitCode> {
  try {
    const config = getConfigManager().getConfig();

    if (key) {
      const entry = Object.entries(config).find(([name]) => name === key);
      if (!entry) {
        console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
        return ExitCodes.FAILURE;
      }
      console.log(chalk.cyan(`${key}: `) + JSON.stringify(entry[1]));
    } else {
      console.log(JSON.stringify(config, null, 2));
    }
    return ExitCodes.SUCCESS;
  } catch (error) {
    console.error(chalk.red(`설정 조회 실패: ${getErrorMessage(error)}`));
    return ExitCodes.FAILURE;
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<ExitCode> {
  try {
    const parsedValue = parseConfigValue(value);
    getConfigManager().set(key, parsedValue);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
    return ExitCodes.SUCCESS;
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${getErrorMessage(error)}`));
    return ExitCodes.FAILURE;
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<ExitCode> {
  const configManager = getConfigManager();

  try {
    const config = configManager.getConfig();
    const table = new Table({
      head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
      colWidths: [15, 40, 25],
    });

    table.push(
      ['baseUrl', config.baseUrl, descriptions.baseUrl],
      ['timeout', String(config.timeout), descriptions.timeout],
      ['logLevel', config.logLevel, descriptions.logLevel],
      ['logToFile', String(config.logToFile), descriptions.logToFile]
    );

    console.log(chalk.cyan(`\n설정 목록 (${configManager.getConfigPath()}):\n`));
    console.log(table.toString());
    return ExitCodes.SUCCESS;
  } catch (error) {
    console.error(chalk.red(`설정 조회 실패: ${getErrorMessage(error)}`));
    return ExitCodes.FAILURE;
  }
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<ExitCode> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
    return ExitCodes.SUCCESS;
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${getErrorMessage(error)}`));
    return ExitCodes.FAILURE;
  }
}
