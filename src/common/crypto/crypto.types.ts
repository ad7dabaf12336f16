import {
  CanonicalDeserializer,
  CanonicalSerializable,
} from '../codec/canonical';

/**
 * 공개키 관련 타입 정의
 *
 * 키는 불투명한 바이트 덩어리로만 다룸:
 * - fromBytes: 디코딩 + 각 스킴의 유효성 검사 (실패 가능)
 * - toBytes: 인코딩 (항상 성공)
 *
 * 서명/검증/키 교환은 하지 않음
 */

/**
 * PublicKey: 인스턴스 쪽 계약
 */
export interface PublicKey extends CanonicalSerializable {
  toBytes(): Uint8Array;
  equals(other: this): boolean;
}

/**
 * PublicKeyScheme: 키 클래스의 static 쪽 계약
 *
 * 키 클래스 자체를 스킴으로 넘김:
 * ```typescript
 * const scheme: PublicKeyScheme<Ed25519PublicKey> = Ed25519PublicKey;
 * ```
 */
export interface PublicKeyScheme<K extends PublicKey> {
  readonly schemeName: string;
  fromBytes(bytes: Uint8Array): K;
  deserialize(deserializer: CanonicalDeserializer): K;
}
