import { InterchangeFormatError } from '../../../src/common/errors/codec.errors';
import {
  decodeValidatorPublicKeysMessage,
  encodeValidatorPublicKeysMessage,
  getValidatorPublicKeysType,
  ValidatorPublicKeysMessage,
} from '../../../src/validator/interchange/validator-public-keys.message';
import { concat, filled } from '../../helpers/keys';

/**
 * Interchange 메시지 (protobuf) 테스트
 */
describe('ValidatorPublicKeys protobuf message', () => {
  const message: ValidatorPublicKeysMessage = {
    accountAddress: filled(16, 0xaa),
    consensusPublicKey: filled(32, 0x11),
    networkSigningPublicKey: filled(32, 0x22),
    networkIdentityPublicKey: filled(32, 0x33),
  };

  it('proto 파일의 필드를 camelCase로 로드해야 함', () => {
    const type = getValidatorPublicKeysType();

    expect(type.fullName).toBe('.validator.ValidatorPublicKeys');
    expect(type.fieldsArray.map((f) => [f.name, f.id, f.type])).toEqual([
      ['accountAddress', 1, 'bytes'],
      ['consensusPublicKey', 2, 'bytes'],
      ['networkSigningPublicKey', 3, 'bytes'],
      ['networkIdentityPublicKey', 4, 'bytes'],
    ]);
  });

  it('필드 번호 순서대로 length-delimited로 인코딩해야 함', () => {
    const encoded = encodeValidatorPublicKeysMessage(message);

    expect(encoded).toEqual(
      concat(
        Uint8Array.from([0x0a, 16]),
        filled(16, 0xaa),
        Uint8Array.from([0x12, 32]),
        filled(32, 0x11),
        Uint8Array.from([0x1a, 32]),
        filled(32, 0x22),
        Uint8Array.from([0x22, 32]),
        filled(32, 0x33),
      ),
    );
  });

  it('디코딩은 인코딩의 역변환이어야 함', () => {
    const decoded = decodeValidatorPublicKeysMessage(
      encodeValidatorPublicKeysMessage(message),
    );

    expect(decoded).toEqual(message);
  });

  it('빠진 필드는 빈 바이트 배열이 되어야 함', () => {
    const decoded = decodeValidatorPublicKeysMessage(
      concat(Uint8Array.from([0x0a, 16]), filled(16, 0xaa)),
    );

    expect(decoded).toEqual({
      accountAddress: filled(16, 0xaa),
      consensusPublicKey: new Uint8Array(0),
      networkSigningPublicKey: new Uint8Array(0),
      networkIdentityPublicKey: new Uint8Array(0),
    });
  });

  it('잘린 protobuf는 InterchangeFormatError', () => {
    expect(() =>
      decodeValidatorPublicKeysMessage(Uint8Array.from([0x0a, 0x05, 0x01])),
    ).toThrow(InterchangeFormatError);
  });
});
