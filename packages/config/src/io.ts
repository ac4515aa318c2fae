// packages/config/src/io.ts
import JSON5 from 'json5';
import * as fs from 'node:fs';
import type { ConfigDeps } from './types.js';
import { applyDefaults, type ResolvedConfig } from './defaults.js';
import { applyEnvOverrides } from './env-overrides.js';
import { ConfigError } from './errors.js';
import { resolveConfigPath } from './paths.js';
import { validateConfig } from './validation.js';

/** ConfigIO — 설정 읽기 파사드 */
export interface ConfigIO {
  /** 4단계 파이프라인으로 설정 로드 (결과는 캐시) */
  loadConfig(): ResolvedConfig;
  /** 캐시 무효화 */
  invalidateCache(): void;
  /** 현재 설정 파일 경로 */
  readonly configPath: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * ConfigIO 팩토리
 *
 * 4단계 파이프라인:
 *   1. 파일 읽기 (JSON5, 없으면 빈 설정)
 *   2. Zod 검증 (실패 섹션은 버리고 경고)
 *   3. 기본값 적용
 *   4. 환경변수 오버라이드
 */
export function createConfigIO(deps: ConfigDeps = {}): ConfigIO {
  const readFile = deps.readFile ?? ((p: string) => fs.readFileSync(p, 'utf-8'));
  const env = deps.env ?? process.env;
  const configPath = deps.configPath ?? resolveConfigPath(env, deps.homedir);
  const logger = deps.logger;
  let cached: ResolvedConfig | null = null;

  function readRaw(): unknown {
    let content: string;
    try {
      content = readFile(configPath);
    } catch (err) {
      if (isMissingFile(err)) {
        logger?.debug(`Config file not found: ${configPath}, using defaults`);
        return {};
      }
      throw new ConfigError(`Failed to read config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    try {
      return JSON5.parse(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
        details: { configPath },
      });
    }
  }

  function loadConfig(): ResolvedConfig {
    if (cached) {
      return cached;
    }

    const { valid, config, issues } = validateConfig(readRaw());
    if (!valid) {
      for (const issue of issues) {
        logger?.warn(`Config issue [${issue.path}]: ${issue.message}`);
      }
    }

    cached = applyEnvOverrides(applyDefaults(config), env, logger);
    return cached;
  }

  return {
    loadConfig,
    invalidateCache: () => {
      cached = null;
    },
    get configPath() {
      return configPath;
    },
  };
}
