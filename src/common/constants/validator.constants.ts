/**
 * Validator 키 레코드 전역 상수 정의
 */

/**
 * ACCOUNT_ADDRESS_LENGTH: 계정 주소 길이 (바이트)
 *
 * - 외부에서 키로부터 파생된 고정 길이 식별자
 * - 여기서는 길이만 검증 (파생 방식은 검증하지 않음)
 */
export const ACCOUNT_ADDRESS_LENGTH = 16; // bytes

/**
 * SHORT_ADDRESS_LENGTH: 로그용 축약 주소 길이 (바이트)
 *
 * 주소 앞 4바이트 = 8 hex chars
 */
export const SHORT_ADDRESS_LENGTH = 4; // bytes

/**
 * ED25519_PUBLIC_KEY_LENGTH: Ed25519 공개키 길이
 *
 * - 압축된 Edwards 점 (y 좌표 + x 부호 비트)
 * - consensus 키, network signing 키에 사용
 */
export const ED25519_PUBLIC_KEY_LENGTH = 32; // bytes

/**
 * ED25519_FIELD_PRIME: Ed25519 기저 체의 소수 p = 2^255 - 19
 *
 * y 좌표는 p보다 작아야 정규(canonical) 인코딩
 */
export const ED25519_FIELD_PRIME = 2n ** 255n - 19n;

/**
 * X25519_PUBLIC_KEY_LENGTH: X25519 공개키 길이
 *
 * - Montgomery u 좌표
 * - network identity 키 (p2p 암호화 채널 자격 증명)
 */
export const X25519_PUBLIC_KEY_LENGTH = 32; // bytes

/**
 * Interchange 메시지 (protobuf) 정의
 */
export const VALIDATOR_PUBLIC_KEYS_PROTO_FILE = 'validator_public_keys.proto';
export const VALIDATOR_PUBLIC_KEYS_MESSAGE_TYPE =
  'validator.ValidatorPublicKeys';

/**
 * HTTP 서버 기본 포트 (PORT 환경 변수로 변경 가능)
 */
export const DEFAULT_PORT = 3000;
