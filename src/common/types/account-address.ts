import {
  CanonicalDeserializer,
  CanonicalSerializer,
} from '../codec/canonical';
import {
  ACCOUNT_ADDRESS_LENGTH,
  SHORT_ADDRESS_LENGTH,
} from '../constants/validator.constants';
import { MalformedAddressError } from '../errors/codec.errors';
import {
  bytesEqual,
  bytesToHex,
  compareBytes,
  Hex,
  hexToBytes,
  isHexString,
} from './common.types';

/**
 * AccountAddress: 계정 주소
 *
 * - 고정 길이 (16 bytes) 불투명 식별자
 * - 키로부터 외부에서 파생됨 (여기서는 길이만 검증)
 * - 생성 후 변경 불가 (toBytes는 복사본 반환)
 */
export class AccountAddress {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  /**
   * @throws {MalformedAddressError} 길이가 ACCOUNT_ADDRESS_LENGTH가 아닌 경우
   */
  static fromBytes(bytes: Uint8Array): AccountAddress {
    if (bytes.length !== ACCOUNT_ADDRESS_LENGTH) {
      throw new MalformedAddressError(
        `Account address must be ${ACCOUNT_ADDRESS_LENGTH} bytes, got ${bytes.length}`,
      );
    }
    return new AccountAddress(bytes);
  }

  /**
   * "0x" + 32 hex characters
   */
  static fromHex(hex: string): AccountAddress {
    if (!isHexString(hex)) {
      throw new MalformedAddressError(
        'Account address must be a 0x-prefixed hex string',
      );
    }
    return AccountAddress.fromBytes(hexToBytes(hex));
  }

  static deserialize(deserializer: CanonicalDeserializer): AccountAddress {
    return AccountAddress.fromBytes(deserializer.decodeBytes());
  }

  serialize(serializer: CanonicalSerializer): void {
    serializer.encodeBytes(this.bytes);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toHex(): Hex {
    return bytesToHex(this.bytes);
  }

  /**
   * 로그용 축약 표현 (앞 4바이트, 접두사 없음)
   */
  shortStr(): string {
    return this.toHex().slice(2, 2 + SHORT_ADDRESS_LENGTH * 2);
  }

  equals(other: AccountAddress): boolean {
    return bytesEqual(this.bytes, other.bytes);
  }

  compare(other: AccountAddress): number {
    return compareBytes(this.bytes, other.bytes);
  }

  toString(): string {
    return this.toHex();
  }
}
