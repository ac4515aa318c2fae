import type { SmartMailrLogger } from '@smartmailr/infra';

/** createConfigIO()에 주입하는 의존성 */
export interface ConfigDeps {
  readFile?: (filePath: string) => string;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  configPath?: string;
  logger?: Pick<SmartMailrLogger, 'warn' | 'debug'>;
}
