// @smartmailr/types — barrel export
export type * from './common.js';
export type * from './config.js';
export type * from './message.js';
export type * from './triage.js';

// 런타임 값
export { INTENTS, STEP_IDS, EXECUTABLE_STEP_IDS } from './triage.js';

// 브랜드 팩토리 함수
export { createTimestamp, createMessageId } from './common.js';
