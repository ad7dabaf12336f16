import { Ed25519PublicKey } from '../../../src/common/crypto/ed25519';
import { MalformedKeyError } from '../../../src/common/errors/codec.errors';
import { ed25519PublicKeyBytes, filled } from '../../helpers/keys';

/**
 * Ed25519PublicKey 테스트
 *
 * 테스트 범위:
 * - 유효한 공개키 복원
 * - 길이 검증
 * - 정규 인코딩 (y < p) 검증
 * - 곡선 위의 점 검증
 */
describe('Ed25519PublicKey', () => {
  it('실제 Ed25519 공개키를 받아들여야 함', () => {
    const bytes = ed25519PublicKeyBytes(0x01);
    const key = Ed25519PublicKey.fromBytes(bytes);

    expect(key.toBytes()).toEqual(bytes);
  });

  it('항등원 (y = 1, x = 0)은 곡선 위의 점', () => {
    const bytes = new Uint8Array(32);
    bytes[0] = 0x01;

    expect(() => Ed25519PublicKey.fromBytes(bytes)).not.toThrow();
  });

  it('길이가 잘못된 키를 거부해야 함', () => {
    expect(() => Ed25519PublicKey.fromBytes(filled(31, 0x11))).toThrow(
      new MalformedKeyError('Ed25519', 'expected 32 bytes, got 31'),
    );
    expect(() => Ed25519PublicKey.fromBytes(filled(33, 0x11))).toThrow(
      'Invalid Ed25519 public key: expected 32 bytes, got 33',
    );
  });

  it('y >= p 인 비정규 인코딩을 거부해야 함', () => {
    const bytes = filled(32, 0xff);
    bytes[31] = 0x7f;

    expect(() => Ed25519PublicKey.fromBytes(bytes)).toThrow(
      'Invalid Ed25519 public key: non-canonical y coordinate',
    );
  });

  it('곡선 위의 점이 아니면 거부해야 함', () => {
    // y = 1 이면 x = 0 뿐인데 부호 비트가 홀수
    const bytes = new Uint8Array(32);
    bytes[0] = 0x01;
    bytes[31] = 0x80;

    expect(() => Ed25519PublicKey.fromBytes(bytes)).toThrow(
      'Invalid Ed25519 public key: not a point on the curve',
    );
  });

  it('y에 대응하는 x가 없으면 거부해야 함', () => {
    // y = 2: (y² - 1) / (d·y² + 1) 이 제곱 잉여가 아님
    const bytes = new Uint8Array(32);
    bytes[0] = 0x02;

    expect(() => Ed25519PublicKey.fromBytes(bytes)).toThrow(
      'Invalid Ed25519 public key: not a point on the curve',
    );
  });

  it('y = 3 은 곡선 위의 점', () => {
    const bytes = new Uint8Array(32);
    bytes[0] = 0x03;

    expect(() => Ed25519PublicKey.fromBytes(bytes)).not.toThrow();
  });

  it('키 검증은 빠르게 끝나야 함 (유효/무효 모두)', () => {
    const valid = ed25519PublicKeyBytes(0x01);
    const invalid = new Uint8Array(32);
    invalid[0] = 0x02;

    const start = Date.now();
    for (let i = 0; i < 100; i++) {
      Ed25519PublicKey.fromBytes(valid);
      expect(() => Ed25519PublicKey.fromBytes(invalid)).toThrow(
        MalformedKeyError,
      );
    }

    // 키 200개 검증 < 2초 (키당 10ms 미만)
    expect(Date.now() - start).toBeLessThan(2000);
  });

  it('MalformedKeyError는 스킴 이름을 가져야 함', () => {
    let caught: unknown;
    try {
      Ed25519PublicKey.fromBytes(new Uint8Array(0));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedKeyError);
    expect(caught).toMatchObject({ scheme: 'Ed25519' });
  });

  it('equals', () => {
    const a = Ed25519PublicKey.fromBytes(ed25519PublicKeyBytes(0x01));
    const b = Ed25519PublicKey.fromBytes(ed25519PublicKeyBytes(0x02));

    expect(
      a.equals(Ed25519PublicKey.fromBytes(ed25519PublicKeyBytes(0x01))),
    ).toBe(true);
    expect(a.equals(b)).toBe(false);
  });

  it('toBytes는 복사본을 반환해야 함', () => {
    const key = Ed25519PublicKey.fromBytes(ed25519PublicKeyBytes(0x01));
    const bytes = key.toBytes();
    bytes.fill(0);

    expect(key.toBytes()).toEqual(ed25519PublicKeyBytes(0x01));
  });
});
