// packages/infra/src/env.ts
const SMARTMAILR_PREFIX = 'SMARTMAILR_';

/**
 * 환경 변수 조회
 *
 * SMARTMAILR_ 접두사를 우선 검색하고, 없으면 접두사 없는 키를 검색.
 * 빈 문자열은 미설정으로 취급한다.
 */
export function getEnv(
  key: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const prefixed = env[`${SMARTMAILR_PREFIX}${key}`];
  if (prefixed) {
    return prefixed;
  }
  const plain = env[key];
  return plain ? plain : fallback;
}

/** 정수 환경 변수 조회 — 파싱 불가 시 undefined */
export function getIntEnv(key: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = getEnv(key, undefined, env);
  if (raw === undefined || !/^-?\d+$/.test(raw.trim())) {
    return undefined;
  }
  return Number.parseInt(raw, 10);
}
