import { RLP } from '@ethereumjs/rlp';
import keccak from 'keccak';
import { CanonicalFormatError } from '../errors/codec.errors';
import { bytesToHex, Hash } from '../types/common.types';

/**
 * Canonical 바이너리 포맷
 *
 * 해싱/서명에 쓰이는 결정적 인코딩:
 * - 각 필드는 자기 자신의 RLP 바이트 문자열로 인코딩 (길이 + 데이터)
 * - 필드는 고정 순서로 이어 붙임 (바깥 리스트 헤더 없음)
 * - 버전 바이트, 태그, 패딩 없음
 *
 * 예시 (16바이트 주소 + 32바이트 키 1개):
 * ```
 * 0x90 <16 bytes>  0xa0 <32 bytes>
 * ```
 */

export interface CanonicalSerializable {
  serialize(serializer: CanonicalSerializer): void;
}

export type CanonicalReader<T> = (deserializer: CanonicalDeserializer) => T;

export class CanonicalSerializer {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  /**
   * 바이트 문자열 하나를 RLP로 인코딩해서 추가
   */
  encodeBytes(bytes: Uint8Array): this {
    const encoded = RLP.encode(bytes);
    this.chunks.push(encoded);
    this.length += encoded.length;
    return this;
  }

  /**
   * 중첩 구조 인코딩 (값 자신의 serialize에 위임)
   */
  encodeStruct(value: CanonicalSerializable): this {
    value.serialize(this);
    return this;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

export class CanonicalDeserializer {
  private input: Uint8Array;

  constructor(input: Uint8Array) {
    this.input = input;
  }

  /**
   * 아직 읽지 않은 바이트 수
   */
  get remaining(): number {
    return this.input.length;
  }

  /**
   * RLP 바이트 문자열 하나 읽기
   *
   * @throws {CanonicalFormatError} 입력이 잘렸거나, 리스트이거나, 비정규 RLP
   */
  decodeBytes(): Uint8Array {
    // RLP.decode는 빈 입력에 대해 에러 대신 빈 배열을 반환하므로 먼저 확인
    if (this.input.length === 0) {
      throw new CanonicalFormatError('Unexpected end of input');
    }

    const decoded = this.decodeItem();

    if (!(decoded.data instanceof Uint8Array)) {
      throw new CanonicalFormatError('Expected a byte string, found a list');
    }

    this.input = decoded.remainder;
    return decoded.data;
  }

  private decodeItem() {
    try {
      return RLP.decode(this.input, true);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CanonicalFormatError(`Malformed RLP item: ${reason}`, {
        cause: error,
      });
    }
  }

  /**
   * 중첩 구조 디코딩 (reader에 위임)
   */
  decodeStruct<T>(reader: CanonicalReader<T>): T {
    return reader(this);
  }

  /**
   * 모든 입력을 소비했는지 확인
   *
   * @throws {CanonicalFormatError} 남은 바이트가 있는 경우
   */
  finish(): void {
    if (this.input.length !== 0) {
      throw new CanonicalFormatError(
        `Trailing bytes after last field: ${this.input.length} byte(s)`,
      );
    }
  }
}

/**
 * 값을 canonical 바이트로 인코딩
 */
export function encodeCanonical(value: CanonicalSerializable): Uint8Array {
  return new CanonicalSerializer().encodeStruct(value).toBytes();
}

/**
 * canonical 바이트를 정확히 하나의 값으로 디코딩
 *
 * 남은 바이트가 있으면 실패
 */
export function decodeCanonical<T>(
  bytes: Uint8Array,
  reader: CanonicalReader<T>,
): T {
  const deserializer = new CanonicalDeserializer(bytes);
  const value = deserializer.decodeStruct(reader);
  deserializer.finish();
  return value;
}

/**
 * Keccak-256(canonical bytes)
 *
 * 레코드를 해싱/서명하는 컴포넌트가 사용
 */
export function canonicalHash(bytes: Uint8Array): Hash {
  const digest = keccak('keccak256').update(Buffer.from(bytes)).digest();
  return bytesToHex(digest);
}
