import {
  CanonicalDeserializer,
  encodeCanonical,
} from '../../common/codec/canonical';
import { PublicKey, PublicKeyScheme } from '../../common/crypto/crypto.types';
import { Ed25519PublicKey } from '../../common/crypto/ed25519';
import { X25519StaticPublicKey } from '../../common/crypto/x25519';
import {
  DecodeLayer,
  ValidatorPublicKeysDecodeError,
  ValidatorPublicKeysField,
} from '../../common/errors/codec.errors';
import { AccountAddress } from '../../common/types/account-address';
import { hexToBytes } from '../../common/types/common.types';
import { ValidatorPublicKeys } from '../entities/validator-public-keys.entity';
import {
  decodeValidatorPublicKeysMessage,
  encodeValidatorPublicKeysMessage,
  ValidatorPublicKeysMessage,
} from '../interchange/validator-public-keys.message';

/**
 * 레코드가 사용할 키 스킴
 *
 * - signature: consensus 키, network signing 키
 * - keyExchange: network identity 키
 */
export interface ValidatorKeySchemes<S extends PublicKey, X extends PublicKey> {
  signature: PublicKeyScheme<S>;
  keyExchange: PublicKeyScheme<X>;
}

/**
 * JSON 입력 (필드마다 0x hex 문자열)
 */
export type ValidatorPublicKeysInput = Record<ValidatorPublicKeysField, string>;

/**
 * ValidatorPublicKeysCodec
 *
 * 두 가지 포맷의 encode/decode 쌍:
 * 1. Canonical 바이너리 (해싱/서명용, RLP 중첩 구조 4개)
 * 2. Interchange 메시지 (프로세스 간 전송용, protobuf)
 *
 * 규칙:
 * - encode는 항상 성공, 같은 입력 → 같은 바이트
 * - decode는 전부 성공하거나 전부 실패 (부분 생성 없음)
 * - 실패 시 어떤 필드/레이어인지 ValidatorPublicKeysDecodeError로 알림
 *
 * 상태 없음: 여러 곳에서 공유해도 안전
 */
export class ValidatorPublicKeysCodec<S extends PublicKey, X extends PublicKey> {
  constructor(private readonly schemes: ValidatorKeySchemes<S, X>) {}

  // ========================================
  // Canonical 바이너리
  // ========================================

  encodeCanonical(keys: ValidatorPublicKeys<S, X>): Uint8Array {
    return encodeCanonical(keys);
  }

  /**
   * 입력 전체가 정확히 하나의 레코드여야 함
   *
   * @throws {ValidatorPublicKeysDecodeError} 잘림, 필드 오류, 남은 바이트
   */
  decodeCanonical(bytes: Uint8Array): ValidatorPublicKeys<S, X> {
    const deserializer = new CanonicalDeserializer(bytes);
    const keys = this.deserialize(deserializer);

    try {
      deserializer.finish();
    } catch (error) {
      throw new ValidatorPublicKeysDecodeError('canonical', undefined, error);
    }

    return keys;
  }

  /**
   * 스트림 디코딩: 레코드 하나를 읽고 나머지는 호출자에게 남김
   *
   * 더 큰 canonical 구조 안에 레코드가 들어 있을 때 사용
   */
  deserialize(deserializer: CanonicalDeserializer): ValidatorPublicKeys<S, X> {
    const { signature, keyExchange } = this.schemes;

    const accountAddress = decodeField('canonical', 'accountAddress', () =>
      deserializer.decodeStruct(AccountAddress.deserialize),
    );
    const consensusPublicKey = decodeField(
      'canonical',
      'consensusPublicKey',
      () => deserializer.decodeStruct((d) => signature.deserialize(d)),
    );
    const networkSigningPublicKey = decodeField(
      'canonical',
      'networkSigningPublicKey',
      () => deserializer.decodeStruct((d) => signature.deserialize(d)),
    );
    const networkIdentityPublicKey = decodeField(
      'canonical',
      'networkIdentityPublicKey',
      () => deserializer.decodeStruct((d) => keyExchange.deserialize(d)),
    );

    return new ValidatorPublicKeys(
      accountAddress,
      consensusPublicKey,
      networkSigningPublicKey,
      networkIdentityPublicKey,
    );
  }

  // ========================================
  // Interchange 메시지 (protobuf)
  // ========================================

  /**
   * 각 필드의 raw 바이트를 메시지 필드로 복사 (항상 성공)
   */
  toInterchange(keys: ValidatorPublicKeys<S, X>): ValidatorPublicKeysMessage {
    return {
      accountAddress: keys.accountAddress.toBytes(),
      consensusPublicKey: keys.consensusPublicKey.toBytes(),
      networkSigningPublicKey: keys.networkSigningPublicKey.toBytes(),
      networkIdentityPublicKey: keys.networkIdentityPublicKey.toBytes(),
    };
  }

  /**
   * 메시지의 4개 필드를 각 타입으로 복원
   *
   * @throws {ValidatorPublicKeysDecodeError} 처음 실패한 필드 이름 포함
   */
  fromInterchange(
    message: ValidatorPublicKeysMessage,
  ): ValidatorPublicKeys<S, X> {
    return this.fromFieldBytes('interchange', (field) => message[field]);
  }

  encodeInterchange(keys: ValidatorPublicKeys<S, X>): Uint8Array {
    return encodeValidatorPublicKeysMessage(this.toInterchange(keys));
  }

  /**
   * protobuf wire 바이트 → 레코드
   */
  decodeInterchange(bytes: Uint8Array): ValidatorPublicKeys<S, X> {
    let message: ValidatorPublicKeysMessage;
    try {
      message = decodeValidatorPublicKeysMessage(bytes);
    } catch (error) {
      throw new ValidatorPublicKeysDecodeError('interchange', undefined, error);
    }
    return this.fromInterchange(message);
  }

  // ========================================
  // JSON (toJSON의 역변환)
  // ========================================

  fromJSON(json: ValidatorPublicKeysInput): ValidatorPublicKeys<S, X> {
    return this.fromFieldBytes('json', (field) => hexToBytes(json[field]));
  }

  private fromFieldBytes(
    layer: DecodeLayer,
    read: (field: ValidatorPublicKeysField) => Uint8Array,
  ): ValidatorPublicKeys<S, X> {
    const { signature, keyExchange } = this.schemes;

    const accountAddress = decodeField(layer, 'accountAddress', () =>
      AccountAddress.fromBytes(read('accountAddress')),
    );
    const consensusPublicKey = decodeField(layer, 'consensusPublicKey', () =>
      signature.fromBytes(read('consensusPublicKey')),
    );
    const networkSigningPublicKey = decodeField(
      layer,
      'networkSigningPublicKey',
      () => signature.fromBytes(read('networkSigningPublicKey')),
    );
    const networkIdentityPublicKey = decodeField(
      layer,
      'networkIdentityPublicKey',
      () => keyExchange.fromBytes(read('networkIdentityPublicKey')),
    );

    return new ValidatorPublicKeys(
      accountAddress,
      consensusPublicKey,
      networkSigningPublicKey,
      networkIdentityPublicKey,
    );
  }
}

function decodeField<T>(
  layer: DecodeLayer,
  field: ValidatorPublicKeysField,
  decode: () => T,
): T {
  try {
    return decode();
  } catch (error) {
    throw new ValidatorPublicKeysDecodeError(layer, field, error);
  }
}

/**
 * 기본 코덱: Ed25519 (consensus, network signing) + X25519 (network identity)
 */
export const validatorPublicKeysCodec = new ValidatorPublicKeysCodec({
  signature: Ed25519PublicKey,
  keyExchange: X25519StaticPublicKey,
});
