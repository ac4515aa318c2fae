// packages/server/src/triage/quality-assurance.ts
import { DEFAULT_SIGNATURE, type Signature } from './reply-generator.js';

export function signatureBlock(signature: Signature): string {
  return `${signature.signOff}\n${signature.name}`;
}

/**
 * 회신 최종 정리 (멱등)
 *
 * 1. 각 줄 앞뒤 공백 제거, 빈 줄 제거
 * 2. 두 줄 서명이 그대로 없으면 마지막 줄 뒤에 덧붙임
 *
 * 출력에는 빈 줄이 없다. finalizeReply(finalizeReply(x)) === finalizeReply(x)
 */
export function finalizeReply(text: string, signature: Signature = DEFAULT_SIGNATURE): string {
  const tidy = text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');

  const block = signatureBlock(signature);
  if (tidy.includes(block)) {
    return tidy;
  }
  return tidy.length > 0 ? `${tidy}\n${block}` : block;
}
