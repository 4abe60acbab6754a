import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { ConfigError, getErrorMessage } from '../utils/errors';

// 설정 인터페이스 정의
export interface Config {
  /** 저장소 루트 URL (current.list 위치) */
  baseUrl: string;
  /** 요청 타임아웃 (ms) */
  timeout: number;
  logLevel: LogLevel;
  /** 파일 로그 사용 여부 */
  logToFile: boolean;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export const DEFAULT_BASE_URL = 'http://dev.lsstcorp.org/dmspkgs';

// 기본 설정값
export const DEFAULT_CONFIG: Config = {
  baseUrl: DEFAULT_BASE_URL,
  timeout: 30000,
  logLevel: 'warn',
  logToFile: false,
};

export const CONFIG_KEYS: ReadonlyArray<keyof Config> = ['baseUrl', 'timeout', 'logLevel', 'logToFile'];

function isConfigKey(key: string): key is keyof Config {
  return CONFIG_KEYS.some((k) => k === key);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseTimeout(value: unknown): number | undefined {
  const num = typeof value === 'string' ? Number(value) : value;
  if (typeof num === 'number' && Number.isInteger(num) && num > 0) {
    return num;
  }
  return undefined;
}

/**
 * 저장된 JSON 값을 설정으로 병합 (알 수 없는 키나 잘못된 타입은 무시)
 */
function mergeRaw(base: Config, raw: Record<string, unknown>): Config {
  const config = { ...base };
  if (typeof raw.baseUrl === 'string' && raw.baseUrl) config.baseUrl = raw.baseUrl;
  const timeout = parseTimeout(raw.timeout);
  if (timeout !== undefined) config.timeout = timeout;
  if (isLogLevel(raw.logLevel)) config.logLevel = raw.logLevel;
  if (typeof raw.logToFile === 'boolean') config.logToFile = raw.logToFile;
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(configDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.configDir =
      configDir ?? env.EUPS_DEPGRAPH_HOME ?? path.join(os.homedir(), '.eups-depgraph');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정 파일만 읽습니다 (환경변수 미적용).
   */
  readStored(): Config {
    if (!fs.pathExistsSync(this.configPath)) {
      return { ...DEFAULT_CONFIG };
    }

    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.configPath);
    } catch (error) {
      throw new ConfigError(`설정 파일을 읽을 수 없습니다: ${this.configPath}`, {
        cause: getErrorMessage(error),
      });
    }
    return isRecord(raw) ? mergeRaw(DEFAULT_CONFIG, raw) : { ...DEFAULT_CONFIG };
  }

  /**
   * 유효 설정을 반환합니다 (설정 파일 < 환경변수).
   */
  getConfig(): Config {
    return mergeRaw(this.readStored(), {
      baseUrl: this.env.EUPS_DEPGRAPH_BASE_URL,
      timeout: this.env.EUPS_DEPGRAPH_TIMEOUT,
    });
  }

  /**
   * 설정값을 검증 후 저장합니다.
   */
  set(key: string, value: unknown): Config {
    if (!isConfigKey(key)) {
      throw new ConfigError(`알 수 없는 설정 키: ${key}`, { key });
    }

    const config = this.readStored();
    switch (key) {
      case 'baseUrl':
        if (typeof value !== 'string' || !value) {
          throw new ConfigError('baseUrl은 비어 있지 않은 문자열이어야 합니다', { key });
        }
        config.baseUrl = value;
        break;
      case 'timeout': {
        const timeout = parseTimeout(value);
        if (timeout === undefined) {
          throw new ConfigError('timeout은 양의 정수(ms)여야 합니다', { key });
        }
        config.timeout = timeout;
        break;
      }
      case 'logLevel':
        if (!isLogLevel(value)) {
          throw new ConfigError(`logLevel은 ${LOG_LEVELS.join(', ')} 중 하나여야 합니다`, { key });
        }
        config.logLevel = value;
        break;
      case 'logToFile':
        if (typeof value !== 'boolean') {
          throw new ConfigError('logToFile은 true 또는 false여야 합니다', { key });
        }
        config.logToFile = value;
        break;
    }

    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return config;
  }

  /**
   * 설정을 초기화합니다.
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
