import { ed25519 } from '@noble/curves/ed25519';
import {
  CanonicalDeserializer,
  CanonicalSerializer,
} from '../codec/canonical';
import {
  ED25519_FIELD_PRIME,
  ED25519_PUBLIC_KEY_LENGTH,
} from '../constants/validator.constants';
import { MalformedKeyError } from '../errors/codec.errors';
import { bytesEqual } from '../types/common.types';
import { PublicKey } from './crypto.types';

/**
 * Ed25519PublicKey
 *
 * 인코딩 (RFC 8032):
 * - 32바이트 little-endian y 좌표
 * - 마지막 바이트의 최상위 비트 = x의 부호
 *
 * 유효성 검사:
 * 1. 길이 32바이트
 * 2. y < p (정규 인코딩)
 * 3. 곡선 위의 점으로 복원 가능
 *
 * 사용처:
 * - consensus 메시지 검증 키
 * - 네트워크 레이어 메시지 검증 키
 */
export class Ed25519PublicKey implements PublicKey {
  static readonly schemeName = 'Ed25519';

  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  /**
   * @throws {MalformedKeyError} 길이가 틀리거나 곡선 위의 점이 아닌 경우
   */
  static fromBytes(bytes: Uint8Array): Ed25519PublicKey {
    if (bytes.length !== ED25519_PUBLIC_KEY_LENGTH) {
      throw new MalformedKeyError(
        Ed25519PublicKey.schemeName,
        `expected ${ED25519_PUBLIC_KEY_LENGTH} bytes, got ${bytes.length}`,
      );
    }

    if (decodeY(bytes) >= ED25519_FIELD_PRIME) {
      throw new MalformedKeyError(
        Ed25519PublicKey.schemeName,
        'non-canonical y coordinate',
      );
    }

    try {
      // zip215 = false: RFC 8032 엄격 디코딩 (x = 0 이면서 부호 비트 1인 경우 거부)
      ed25519.ExtendedPoint.fromHex(bytes, false);
    } catch (error) {
      throw new MalformedKeyError(
        Ed25519PublicKey.schemeName,
        'not a point on the curve',
        { cause: error },
      );
    }

    return new Ed25519PublicKey(bytes);
  }

  static deserialize(deserializer: CanonicalDeserializer): Ed25519PublicKey {
    return Ed25519PublicKey.fromBytes(deserializer.decodeBytes());
  }

  serialize(serializer: CanonicalSerializer): void {
    serializer.encodeBytes(this.bytes);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  equals(other: Ed25519PublicKey): boolean {
    return bytesEqual(this.bytes, other.bytes);
  }
}

/**
 * 부호 비트를 제외한 little-endian y 좌표
 */
function decodeY(bytes: Uint8Array): bigint {
  let y = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    const byte = i === bytes.length - 1 ? bytes[i] & 0x7f : bytes[i];
    y = (y << 8n) | BigInt(byte);
  }
  return y;
}
