import { CanonicalSerializer } from '../../common/codec/canonical';
import { PublicKey } from '../../common/crypto/crypto.types';
import { Ed25519PublicKey } from '../../common/crypto/ed25519';
import { X25519StaticPublicKey } from '../../common/crypto/x25519';
import { AccountAddress } from '../../common/types/account-address';
import {
  bytesToHex,
  compareBytes,
  Hex,
} from '../../common/types/common.types';

/**
 * ValidatorPublicKeys의 JSON 표현 (모든 필드 0x hex)
 */
export interface ValidatorPublicKeysJSON {
  accountAddress: Hex;
  consensusPublicKey: Hex;
  networkSigningPublicKey: Hex;
  networkIdentityPublicKey: Hex;
}

/**
 * ValidatorPublicKeys Entity
 *
 * 다음 epoch의 validator 집합이 정해지면 consensus와 networking은
 * validator마다 이 레코드를 받음:
 * - accountAddress: 어떤 validator인지 식별
 * - consensusPublicKey: consensus 메시지 서명 검증
 * - networkSigningPublicKey: 네트워크 레이어 메시지 서명 검증
 * - networkIdentityPublicKey: p2p 암호화 채널 참여 자격 증명
 *
 * 불변 값 객체:
 * - 4개 필드 모두 필수, 생성 후 변경 불가
 * - "업데이트"는 새 레코드를 만드는 것
 * - 필드 순서 (위 순서)는 canonical 포맷의 일부
 *
 * S: 서명 스킴 키 타입, X: 키 교환 스킴 키 타입
 */
export class ValidatorPublicKeys<
  S extends PublicKey = Ed25519PublicKey,
  X extends PublicKey = X25519StaticPublicKey,
> {
  constructor(
    readonly accountAddress: AccountAddress,
    readonly consensusPublicKey: S,
    readonly networkSigningPublicKey: S,
    readonly networkIdentityPublicKey: X,
  ) {}

  /**
   * 필드 순서대로 사전식 비교 (정렬/중복 제거용)
   */
  static compare<S extends PublicKey, X extends PublicKey>(
    a: ValidatorPublicKeys<S, X>,
    b: ValidatorPublicKeys<S, X>,
  ): number {
    return (
      a.accountAddress.compare(b.accountAddress) ||
      compareBytes(
        a.consensusPublicKey.toBytes(),
        b.consensusPublicKey.toBytes(),
      ) ||
      compareBytes(
        a.networkSigningPublicKey.toBytes(),
        b.networkSigningPublicKey.toBytes(),
      ) ||
      compareBytes(
        a.networkIdentityPublicKey.toBytes(),
        b.networkIdentityPublicKey.toBytes(),
      )
    );
  }

  /**
   * 구조적 동등성: 4개 필드가 모두 바이트 단위로 같아야 함
   */
  equals(other: ValidatorPublicKeys<S, X>): boolean {
    return (
      this.accountAddress.equals(other.accountAddress) &&
      this.consensusPublicKey.equals(other.consensusPublicKey) &&
      this.networkSigningPublicKey.equals(other.networkSigningPublicKey) &&
      this.networkIdentityPublicKey.equals(other.networkIdentityPublicKey)
    );
  }

  /**
   * Canonical 인코딩: 4개 필드를 고정 순서의 중첩 구조로 기록
   */
  serialize(serializer: CanonicalSerializer): void {
    serializer
      .encodeStruct(this.accountAddress)
      .encodeStruct(this.consensusPublicKey)
      .encodeStruct(this.networkSigningPublicKey)
      .encodeStruct(this.networkIdentityPublicKey);
  }

  /**
   * 로그용 표현: 축약 주소만 (키 바이트는 출력하지 않음)
   */
  toString(): string {
    return `accountAddress: ${this.accountAddress.shortStr()}`;
  }

  /**
   * JSON 직렬화
   */
  toJSON(): ValidatorPublicKeysJSON {
    return {
      accountAddress: this.accountAddress.toHex(),
      consensusPublicKey: bytesToHex(this.consensusPublicKey.toBytes()),
      networkSigningPublicKey: bytesToHex(
        this.networkSigningPublicKey.toBytes(),
      ),
      networkIdentityPublicKey: bytesToHex(
        this.networkIdentityPublicKey.toBytes(),
      ),
    };
  }
}
