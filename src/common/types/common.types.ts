import {
  bytesToHex as toPrefixedHex,
  hexToBytes as fromPrefixedHex,
} from '@ethereumjs/util';

/**
 * 코덱 전체에서 사용되는 공통 타입 정의
 */

/**
 * Hex: "0x" 접두사가 붙은 hex 문자열
 *
 * JSON/HTTP 경계에서 바이트 배열을 표현하는 형식
 */
export type Hex = `0x${string}`;

/**
 * Hash: Keccak-256 해시값
 */
export type Hash = Hex; // "0x" + 64 hex characters

/**
 * HEX 문자열에서 "0x" 접두사 제거
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex.slice(2) : hex;
}

/**
 * HEX 문자열에 "0x" 접두사 추가
 */
export function addHexPrefix(hex: string): Hex {
  return `0x${stripHexPrefix(hex)}`;
}

/**
 * HEX 문자열 형식 검증
 *
 * @param value - 검증할 문자열
 * @param byteLength - 예상되는 바이트 길이 (선택, 예: 32 = 64 hex chars)
 */
export function isHexString(value: unknown, byteLength?: number): value is Hex {
  if (typeof value !== 'string' || !/^0x[0-9a-fA-F]*$/.test(value)) {
    return false;
  }

  const hex = stripHexPrefix(value);

  // 홀수 길이 hex는 무효
  if (hex.length % 2 !== 0) {
    return false;
  }

  if (byteLength !== undefined && hex.length !== byteLength * 2) {
    return false;
  }

  return true;
}

/**
 * Hex 문자열을 Uint8Array로 변환
 *
 * - "0x123abc" → Uint8Array [0x12, 0x3a, 0xbc]
 * - 길이 검증은 하지 않음 (각 타입의 fromBytes가 담당)
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!isHexString(hex)) {
    throw new Error(`Invalid hex string: expected 0x-prefixed even-length hex`);
  }
  return fromPrefixedHex(hex);
}

/**
 * Uint8Array를 Hex 문자열로 변환
 */
export function bytesToHex(bytes: Uint8Array): Hex {
  return addHexPrefix(toPrefixedHex(bytes));
}

/**
 * 바이트 배열 비교 (동등성)
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * 바이트 배열 사전식 비교
 *
 * 공통 접두사가 같으면 짧은 쪽이 먼저
 *
 * @returns 음수 (a < b), 0 (같음), 양수 (a > b)
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}
