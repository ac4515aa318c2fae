import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// 개발자 셸의 설정이 테스트 결과를 바꾸지 않도록 격리
const SENSITIVE_KEYS = [
  'SMARTMAILR_CONFIG',
  'SMARTMAILR_LOG_LEVEL',
  'SMARTMAILR_MAX_CONCURRENT',
  'LOG_LEVEL',
  'MAX_CONCURRENT',
  'NODE_OPTIONS',
] as const;

interface EnvSnapshot {
  vars: Record<string, string | undefined>;
  tmpDir: string;
}

let snapshot: EnvSnapshot | null = null;

export function isolateEnv(): void {
  if (snapshot) return;

  const vars: Record<string, string | undefined> = {};
  for (const key of SENSITIVE_KEYS) {
    vars[key] = process.env[key];
    delete process.env[key];
  }

  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'smartmailr-test-'));

  process.env.HOME = tmpDir;
  process.env.NODE_ENV = 'test';

  snapshot = { vars, tmpDir };
}

export function restoreEnv(): void {
  if (!snapshot) return;

  for (const [key, value] of Object.entries(snapshot.vars)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  fs.rmSync(snapshot.tmpDir, { recursive: true, force: true });

  snapshot = null;
}
