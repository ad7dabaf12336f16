import {
  CanonicalDeserializer,
  CanonicalSerializer,
} from '../codec/canonical';
import { X25519_PUBLIC_KEY_LENGTH } from '../constants/validator.constants';
import { MalformedKeyError } from '../errors/codec.errors';
import { bytesEqual } from '../types/common.types';
import { PublicKey } from './crypto.types';

/**
 * X25519StaticPublicKey
 *
 * - Montgomery u 좌표 32바이트
 * - 모든 32바이트 값이 유효한 공개키 (길이만 검사)
 * - p2p 암호화 채널을 맺을 자격을 증명하는 키
 */
export class X25519StaticPublicKey implements PublicKey {
  static readonly schemeName = 'X25519';

  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  static fromBytes(bytes: Uint8Array): X25519StaticPublicKey {
    if (bytes.length !== X25519_PUBLIC_KEY_LENGTH) {
      throw new MalformedKeyError(
        X25519StaticPublicKey.schemeName,
        `expected ${X25519_PUBLIC_KEY_LENGTH} bytes, got ${bytes.length}`,
      );
    }
    return new X25519StaticPublicKey(bytes);
  }

  static deserialize(
    deserializer: CanonicalDeserializer,
  ): X25519StaticPublicKey {
    return X25519StaticPublicKey.fromBytes(deserializer.decodeBytes());
  }

  serialize(serializer: CanonicalSerializer): void {
    serializer.encodeBytes(this.bytes);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  equals(other: X25519StaticPublicKey): boolean {
    return bytesEqual(this.bytes, other.bytes);
  }
}
