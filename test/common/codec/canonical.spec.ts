import {
  CanonicalDeserializer,
  CanonicalSerializer,
  canonicalHash,
  decodeCanonical,
} from '../../../src/common/codec/canonical';
import { CanonicalFormatError } from '../../../src/common/errors/codec.errors';
import { concat, filled } from '../../helpers/keys';

/**
 * Canonical 바이너리 포맷 테스트
 *
 * 테스트 범위:
 * - 바이트 문자열 인코딩 (RLP)
 * - 순서대로 디코딩
 * - 잘린 입력 / 리스트 / 남은 바이트 거부
 * - Keccak-256 해시
 */
describe('Canonical Codec', () => {
  describe('CanonicalSerializer', () => {
    it('바이트 문자열을 길이 접두사와 함께 이어 붙여야 함', () => {
      const encoded = new CanonicalSerializer()
        .encodeBytes(filled(2, 0xaa))
        .encodeBytes(filled(32, 0x11))
        .toBytes();

      expect(encoded).toEqual(
        concat(
          Uint8Array.from([0x82, 0xaa, 0xaa]),
          Uint8Array.from([0xa0]),
          filled(32, 0x11),
        ),
      );
    });

    it('빈 바이트 문자열은 0x80이어야 함', () => {
      const encoded = new CanonicalSerializer()
        .encodeBytes(new Uint8Array(0))
        .toBytes();

      expect(encoded).toEqual(Uint8Array.from([0x80]));
    });

    it('56바이트 이상은 긴 길이 접두사를 사용해야 함', () => {
      const encoded = new CanonicalSerializer()
        .encodeBytes(filled(56, 0x01))
        .toBytes();

      expect(encoded.length).toBe(58);
      expect(Array.from(encoded.subarray(0, 2))).toEqual([0xb8, 56]);
    });

    it('아무것도 인코딩하지 않으면 빈 바이트', () => {
      expect(new CanonicalSerializer().toBytes()).toEqual(new Uint8Array(0));
    });
  });

  describe('CanonicalDeserializer', () => {
    it('순서대로 바이트 문자열을 읽어야 함', () => {
      const deserializer = new CanonicalDeserializer(
        concat(Uint8Array.from([0x82, 0x01, 0x02]), Uint8Array.from([0x80])),
      );

      expect(deserializer.decodeBytes()).toEqual(Uint8Array.from([1, 2]));
      expect(deserializer.remaining).toBe(1);
      expect(deserializer.decodeBytes()).toEqual(new Uint8Array(0));
      expect(deserializer.remaining).toBe(0);
      expect(() => deserializer.finish()).not.toThrow();
    });

    it('빈 입력에서 읽으면 에러', () => {
      const deserializer = new CanonicalDeserializer(new Uint8Array(0));

      expect(() => deserializer.decodeBytes()).toThrow(
        new CanonicalFormatError('Unexpected end of input'),
      );
    });

    it('잘린 바이트 문자열은 에러', () => {
      const deserializer = new CanonicalDeserializer(
        Uint8Array.from([0x83, 0x01, 0x02]),
      );

      expect(() => deserializer.decodeBytes()).toThrow(CanonicalFormatError);
    });

    it('리스트는 거부해야 함', () => {
      const deserializer = new CanonicalDeserializer(
        Uint8Array.from([0xc2, 0x01, 0x02]),
      );

      expect(() => deserializer.decodeBytes()).toThrow(
        'Expected a byte string, found a list',
      );
    });

    it('비정규 RLP (단일 바이트에 접두사)를 거부해야 함', () => {
      const deserializer = new CanonicalDeserializer(
        Uint8Array.from([0x81, 0x05]),
      );

      expect(() => deserializer.decodeBytes()).toThrow(CanonicalFormatError);
    });

    it('남은 바이트가 있으면 finish가 실패해야 함', () => {
      const deserializer = new CanonicalDeserializer(
        Uint8Array.from([0x80, 0x00, 0x00]),
      );
      deserializer.decodeBytes();

      expect(() => deserializer.finish()).toThrow(
        'Trailing bytes after last field: 2 byte(s)',
      );
    });
  });

  describe('decodeCanonical', () => {
    const readPair = (d: CanonicalDeserializer) => [
      d.decodeBytes(),
      d.decodeBytes(),
    ];

    it('정확히 소비되면 값을 반환해야 함', () => {
      const result = decodeCanonical(
        Uint8Array.from([0x81, 0xff, 0x01]),
        readPair,
      );

      expect(result).toEqual([Uint8Array.from([0xff]), Uint8Array.from([1])]);
    });

    it('남은 바이트가 있으면 실패해야 함', () => {
      expect(() =>
        decodeCanonical(Uint8Array.from([0x81, 0xff, 0x01, 0x02]), readPair),
      ).toThrow(CanonicalFormatError);
    });
  });

  describe('canonicalHash', () => {
    it('빈 입력의 Keccak-256 해시', () => {
      expect(canonicalHash(new Uint8Array(0))).toBe(
        '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470',
      );
    });

    it('같은 입력이면 같은 해시', () => {
      const bytes = filled(40, 0x42);
      expect(canonicalHash(bytes)).toBe(canonicalHash(Uint8Array.from(bytes)));
      expect(canonicalHash(bytes)).toMatch(/^0x[0-9a-f]{64}$/);
    });
  });
});
