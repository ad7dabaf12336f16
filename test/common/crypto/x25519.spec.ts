import { X25519StaticPublicKey } from '../../../src/common/crypto/x25519';
import { MalformedKeyError } from '../../../src/common/errors/codec.errors';
import { filled } from '../../helpers/keys';

/**
 * X25519StaticPublicKey 테스트
 */
describe('X25519StaticPublicKey', () => {
  it('임의의 32바이트를 받아들여야 함', () => {
    for (const byte of [0x00, 0x33, 0xff]) {
      const key = X25519StaticPublicKey.fromBytes(filled(32, byte));
      expect(key.toBytes()).toEqual(filled(32, byte));
    }
  });

  it('길이가 잘못된 키를 거부해야 함', () => {
    expect(() => X25519StaticPublicKey.fromBytes(filled(16, 0x33))).toThrow(
      new MalformedKeyError('X25519', 'expected 32 bytes, got 16'),
    );
  });

  it('equals', () => {
    const a = X25519StaticPublicKey.fromBytes(filled(32, 0x33));

    const same = X25519StaticPublicKey.fromBytes(filled(32, 0x33));
    const other = X25519StaticPublicKey.fromBytes(filled(32, 0x34));

    expect(a.equals(same)).toBe(true);
    expect(a.equals(other)).toBe(false);
  });
});
