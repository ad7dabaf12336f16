import { Injectable, Logger } from '@nestjs/common';
import { canonicalHash } from '../common/codec/canonical';
import { ValidatorPublicKeysDecodeError } from '../common/errors/codec.errors';
import { Hash } from '../common/types/common.types';
import {
  ValidatorPublicKeysInput,
  validatorPublicKeysCodec,
} from './codec/validator-public-keys.codec';
import { ValidatorPublicKeys } from './entities/validator-public-keys.entity';

/**
 * Validator Service
 *
 * 역할:
 * - ValidatorPublicKeys canonical 인코딩/디코딩
 * - canonical 해시 계산
 * - interchange (protobuf) 인코딩/디코딩
 * - JSON 입력 검증
 *
 * 디코딩 실패는 경고 로그를 남기고 그대로 다시 던짐
 * (로그에는 필드/레이어만, 키 바이트는 남기지 않음)
 */
@Injectable()
export class ValidatorService {
  private readonly logger = new Logger(ValidatorService.name);

  private readonly codec = validatorPublicKeysCodec;

  encodeCanonical(keys: ValidatorPublicKeys): Uint8Array {
    return this.codec.encodeCanonical(keys);
  }

  decodeCanonical(bytes: Uint8Array): ValidatorPublicKeys {
    return this.decode(() => this.codec.decodeCanonical(bytes));
  }

  /**
   * Keccak-256(canonical bytes)
   */
  hashCanonical(keys: ValidatorPublicKeys): Hash {
    return canonicalHash(this.encodeCanonical(keys));
  }

  encodeInterchange(keys: ValidatorPublicKeys): Uint8Array {
    return this.codec.encodeInterchange(keys);
  }

  decodeInterchange(bytes: Uint8Array): ValidatorPublicKeys {
    return this.decode(() => this.codec.decodeInterchange(bytes));
  }

  fromJSON(json: ValidatorPublicKeysInput): ValidatorPublicKeys {
    return this.decode(() => this.codec.fromJSON(json));
  }

  private decode(decode: () => ValidatorPublicKeys): ValidatorPublicKeys {
    try {
      const keys = decode();
      this.logger.debug(`Decoded validator keys (${keys})`);
      return keys;
    } catch (error) {
      if (error instanceof ValidatorPublicKeysDecodeError) {
        this.logger.warn(
          `Rejected validator keys [${error.layer}${error.field ? `.${error.field}` : ''}]: ${error.message}`,
        );
      }
      throw error;
    }
  }
}
