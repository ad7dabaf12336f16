/**
 * 코덱 에러 정의
 *
 * 분류:
 * - MalformedAddressError: 주소 바이트가 잘못됨
 * - MalformedKeyError: 공개키 바이트가 잘못됨 (길이, 곡선 위의 점 아님 등)
 * - CanonicalFormatError: canonical 바이트 자체가 잘못됨 (잘림, 남은 바이트 등)
 * - InterchangeFormatError: protobuf 메시지 파싱 실패
 * - ValidatorPublicKeysDecodeError: 위 에러를 필드/레이어 정보와 함께 감싼 에러
 */

export class CodecError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedAddressError extends CodecError {}

export class MalformedKeyError extends CodecError {
  constructor(
    readonly scheme: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid ${scheme} public key: ${message}`, options);
  }
}

export class CanonicalFormatError extends CodecError {}

export class InterchangeFormatError extends CodecError {}

/**
 * ValidatorPublicKeys 필드 이름 (wire 순서)
 */
export const VALIDATOR_PUBLIC_KEYS_FIELDS = [
  'accountAddress',
  'consensusPublicKey',
  'networkSigningPublicKey',
  'networkIdentityPublicKey',
] as const;

export type ValidatorPublicKeysField =
  (typeof VALIDATOR_PUBLIC_KEYS_FIELDS)[number];

/**
 * 디코딩이 실패한 레이어
 */
export type DecodeLayer = 'canonical' | 'interchange' | 'json';

/**
 * ValidatorPublicKeys 디코딩 실패
 *
 * - field: 실패한 필드 (남은 바이트 에러는 undefined)
 * - layer: 어떤 포맷을 디코딩하다 실패했는지
 * - cause: 필드 디코더가 던진 원래 에러
 */
export class ValidatorPublicKeysDecodeError extends CodecError {
  readonly field: ValidatorPublicKeysField | undefined;
  readonly layer: DecodeLayer;

  constructor(
    layer: DecodeLayer,
    field: ValidatorPublicKeysField | undefined,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const location = field ? `${layer}.${field}` : layer;
    super(`Failed to decode ValidatorPublicKeys (${location}): ${reason}`, {
      cause,
    });
    this.layer = layer;
    this.field = field;
  }
}
