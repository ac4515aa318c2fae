// packages/config/src/paths.ts
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * 설정 파일 경로 해석 (JSON5)
 *
 * 우선순위:
 *   1. SMARTMAILR_CONFIG 환경변수
 *   2. ~/.smartmailr/smartmailr.json5
 *   3. ./smartmailr.json5
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const envPath = env.SMARTMAILR_CONFIG;
  if (envPath) {
    return path.resolve(envPath);
  }

  const homePath = path.join(homedir(), '.smartmailr', 'smartmailr.json5');
  if (fs.existsSync(homePath)) {
    return homePath;
  }

  return path.resolve('smartmailr.json5');
}
