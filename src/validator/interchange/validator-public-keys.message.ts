import * as fs from 'fs';
import * as path from 'path';
import * as protobuf from 'protobufjs';
import {
  VALIDATOR_PUBLIC_KEYS_MESSAGE_TYPE,
  VALIDATOR_PUBLIC_KEYS_PROTO_FILE,
} from '../../common/constants/validator.constants';
import {
  InterchangeFormatError,
  VALIDATOR_PUBLIC_KEYS_FIELDS,
} from '../../common/errors/codec.errors';

/**
 * Interchange 메시지: proto/validator_public_keys.proto 의
 * validator.ValidatorPublicKeys (필드명은 camelCase로 로드됨)
 *
 * 필드는 모두 raw bytes이며 여기서는 검증하지 않음
 * (검증은 ValidatorPublicKeysCodec.fromInterchange)
 */
export type ValidatorPublicKeysMessage = {
  accountAddress: Uint8Array;
  consensusPublicKey: Uint8Array;
  networkSigningPublicKey: Uint8Array;
  networkIdentityPublicKey: Uint8Array;
};

let messageType: protobuf.Type | undefined;

function findProtoFile(): string {
  const possiblePaths = [
    path.resolve(__dirname, '../../../proto', VALIDATOR_PUBLIC_KEYS_PROTO_FILE),
    path.resolve(
      __dirname,
      '../../../../proto',
      VALIDATOR_PUBLIC_KEYS_PROTO_FILE,
    ),
    path.resolve(process.cwd(), 'proto', VALIDATOR_PUBLIC_KEYS_PROTO_FILE),
  ];

  for (const filePath of possiblePaths) {
    if (fs.existsSync(filePath)) {
      return filePath;
    }
  }

  throw new Error(`${VALIDATOR_PUBLIC_KEYS_PROTO_FILE} not found`);
}

/**
 * protobuf 메시지 타입 (최초 호출 시 한 번 로드)
 */
export function getValidatorPublicKeysType(): protobuf.Type {
  if (!messageType) {
    const root = protobuf.loadSync(findProtoFile());
    messageType = root.lookupType(VALIDATOR_PUBLIC_KEYS_MESSAGE_TYPE);
  }
  return messageType;
}

/**
 * 메시지 → protobuf wire 바이트
 */
export function encodeValidatorPublicKeysMessage(
  message: ValidatorPublicKeysMessage,
): Uint8Array {
  const type = getValidatorPublicKeysType();
  return Uint8Array.from(type.encode(type.create(message)).finish());
}

/**
 * protobuf wire 바이트 → 메시지
 *
 * 빠진 필드는 빈 바이트 배열이 됨 (proto3 기본값)
 *
 * @throws {InterchangeFormatError} protobuf 파싱 실패
 */
export function decodeValidatorPublicKeysMessage(
  bytes: Uint8Array,
): ValidatorPublicKeysMessage {
  const type = getValidatorPublicKeysType();

  let decoded: { [key: string]: unknown };
  try {
    decoded = type.toObject(type.decode(bytes), { defaults: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InterchangeFormatError(`Malformed protobuf message: ${reason}`, {
      cause: error,
    });
  }

  const [
    accountAddress,
    consensusPublicKey,
    networkSigningPublicKey,
    networkIdentityPublicKey,
  ] = VALIDATOR_PUBLIC_KEYS_FIELDS.map((field) => {
    const value = decoded[field];
    if (!(value instanceof Uint8Array)) {
      throw new InterchangeFormatError(`Field ${field} is not a byte array`);
    }
    return Uint8Array.from(value);
  });

  return {
    accountAddress,
    consensusPublicKey,
    networkSigningPublicKey,
    networkIdentityPublicKey,
  };
}
