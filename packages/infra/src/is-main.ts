// packages/infra/src/is-main.ts
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * ESM 엔트리포인트 판별
 *
 * `import.meta.url`과 `process.argv[1]`을 비교하여
 * 현재 모듈이 직접 실행되었는지 판별.
 */
export function isMain(importMetaUrl: string, argv1: string | undefined = process.argv[1]): boolean {
  if (!argv1) {
    return false;
  }
  try {
    return fileURLToPath(importMetaUrl) === path.resolve(argv1);
  } catch {
    return false;
  }
}
