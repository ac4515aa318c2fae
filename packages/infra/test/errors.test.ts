import { describe, it, expect } from 'vitest';
import {
  SmartMailrError,
  isSmartMailrError,
  toError,
  extractErrorInfo,
} from '../src/errors.js';

describe('SmartMailrError', () => {
  it('기본값으로 생성된다', () => {
    const err = new SmartMailrError('test', 'TEST_CODE');
    expect(err.message).toBe('test');
    expect(err.code).toBe('TEST_CODE');
    expect(err.statusCode).toBe(500);
    expect(err.isOperational).toBe(true);
    expect(err.name).toBe('SmartMailrError');
  });

  it('옵션으로 커스터마이징된다', () => {
    const cause = new Error('root');
    const err = new SmartMailrError('test', 'CODE', {
      statusCode: 400,
      isOperational: false,
      cause,
      details: { key: 'value' },
    });
    expect(err.statusCode).toBe(400);
    expect(err.isOperational).toBe(false);
    expect(err.cause).toBe(cause);
    expect(err.details).toEqual({ key: 'value' });
  });

  it('Error를 상속한다', () => {
    const err = new SmartMailrError('test', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err.stack).toBeDefined();
  });
});

describe('isSmartMailrError', () => {
  it('SmartMailrError 인스턴스에 true', () => {
    expect(isSmartMailrError(new SmartMailrError('test', 'CODE'))).toBe(true);
  });

  it('일반 Error와 non-Error에 false', () => {
    expect(isSmartMailrError(new Error('test'))).toBe(false);
    expect(isSmartMailrError('string')).toBe(false);
    expect(isSmartMailrError(null)).toBe(false);
  });
});

describe('toError', () => {
  it('Error는 동일 참조를 반환한다', () => {
    const e = new Error('x');
    expect(toError(e)).toBe(e);
  });

  it('원시값은 문자열화한다', () => {
    expect(toError(42).message).toBe('42');
  });
});

describe('extractErrorInfo', () => {
  it('SmartMailrError 정보를 추출한다', () => {
    const err = new SmartMailrError('msg', 'CODE', { cause: new Error('c') });
    const info = extractErrorInfo(err);
    expect(info.code).toBe('CODE');
    expect(info.message).toBe('msg');
    expect(info.isOperational).toBe(true);
    expect(info.cause).toBe('c');
  });

  it('일반 Error는 UNKNOWN 코드', () => {
    expect(extractErrorInfo(new Error('plain')).code).toBe('UNKNOWN');
  });

  it('non-Error는 문자열화한다', () => {
    expect(extractErrorInfo(123)).toEqual({ code: 'UNKNOWN', message: '123' });
  });
});
