// packages/server/src/main.ts
import { createConfigIO } from '@smartmailr/config';
import { createLogger, isMain, isSmartMailrError } from '@smartmailr/infra';
import { fileURLToPath } from 'node:url';
import { buildBatchReport, createTriageOrchestrator, loadInboxFile } from './triage/index.js';

const DEFAULT_INBOX = fileURLToPath(new URL('../fixtures/sample-inbox.json', import.meta.url));

/**
 * 인박스 JSON 파일을 읽어 배치 트리아지 후 결과를 JSON으로 출력
 *
 * 사용: smartmailr [inbox.json]
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const bootLogger = createLogger({ name: 'smartmailr', level: 'warn' });
  const config = createConfigIO({ logger: bootLogger }).loadConfig();
  const logger = createLogger({
    name: 'smartmailr',
    level: config.logging.level,
    console: { pretty: config.logging.pretty },
  });

  const inboxPath = argv[0] ?? DEFAULT_INBOX;
  const messages = loadInboxFile(inboxPath);
  logger.info(`Loaded ${messages.length} messages`, { inboxPath });

  const orchestrator = createTriageOrchestrator(config, { logger });
  const entries = await orchestrator.processBatch(messages);

  process.stdout.write(JSON.stringify(buildBatchReport(messages, entries), null, 2) + '\n');

  if (entries.some((entry) => !entry.ok)) {
    process.exitCode = 1;
  }
}

if (isMain(import.meta.url)) {
  main().catch((err: unknown) => {
    // 입력/설정 오류는 메시지만, 그 외는 스택까지
    if (isSmartMailrError(err) && err.isOperational) {
      console.error(`Failed to process inbox: [${err.code}] ${err.message}`);
    } else {
      console.error('Failed to process inbox:', err);
    }
    process.exit(1);
  });
}
