import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ValidatorPublicKeysDecodeError } from '../common/errors/codec.errors';
import { bytesToHex, hexToBytes } from '../common/types/common.types';
import {
  CanonicalEncodingResponseDto,
  EncodedPayloadDto,
  InterchangeEncodingResponseDto,
  ValidatorPublicKeysDto,
} from './dto/validator-public-keys.dto';
import {
  ValidatorPublicKeys,
  ValidatorPublicKeysJSON,
} from './entities/validator-public-keys.entity';
import { ValidatorService } from './validator.service';

/**
 * Validator Controller
 *
 * ValidatorPublicKeys 인코딩/디코딩 API
 *
 * - POST /validator-keys/canonical: JSON → canonical 바이트 + 해시
 * - POST /validator-keys/canonical/decode: canonical 바이트 → JSON
 * - POST /validator-keys/interchange: JSON → protobuf 바이트
 * - POST /validator-keys/interchange/decode: protobuf 바이트 → JSON
 *
 * 디코딩 실패는 400 (message, field, layer)
 */
@ApiTags('validator')
@Controller('validator-keys')
export class ValidatorController {
  constructor(private readonly validatorService: ValidatorService) {}

  /**
   * POST /validator-keys/canonical
   */
  @Post('canonical')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Canonical 인코딩',
    description:
      'ValidatorPublicKeys를 canonical 바이트로 인코딩하고 Keccak-256 해시를 계산합니다.',
  })
  @ApiResponse({
    status: 200,
    description: '인코딩 결과',
    type: CanonicalEncodingResponseDto,
  })
  @ApiResponse({ status: 400, description: '잘못된 주소 또는 키' })
  encodeCanonical(
    @Body() dto: ValidatorPublicKeysDto,
  ): CanonicalEncodingResponseDto {
    const keys = this.parse(() => this.validatorService.fromJSON(dto));
    return {
      encoded: bytesToHex(this.validatorService.encodeCanonical(keys)),
      hash: this.validatorService.hashCanonical(keys),
      summary: keys.toString(),
    };
  }

  /**
   * POST /validator-keys/canonical/decode
   */
  @Post('canonical/decode')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Canonical 디코딩',
    description: 'canonical 바이트를 ValidatorPublicKeys로 디코딩합니다.',
  })
  @ApiResponse({ status: 200, type: ValidatorPublicKeysDto })
  @ApiResponse({ status: 400, description: '잘린 입력, 남은 바이트, 잘못된 필드' })
  decodeCanonical(@Body() dto: EncodedPayloadDto): ValidatorPublicKeysJSON {
    const keys = this.parse(() =>
      this.validatorService.decodeCanonical(hexToBytes(dto.data)),
    );
    return keys.toJSON();
  }

  /**
   * POST /validator-keys/interchange
   */
  @Post('interchange')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Interchange 인코딩',
    description: 'ValidatorPublicKeys를 protobuf 메시지로 인코딩합니다.',
  })
  @ApiResponse({ status: 200, type: InterchangeEncodingResponseDto })
  @ApiResponse({ status: 400, description: '잘못된 주소 또는 키' })
  encodeInterchange(
    @Body() dto: ValidatorPublicKeysDto,
  ): InterchangeEncodingResponseDto {
    const keys = this.parse(() => this.validatorService.fromJSON(dto));
    return {
      encoded: bytesToHex(this.validatorService.encodeInterchange(keys)),
    };
  }

  /**
   * POST /validator-keys/interchange/decode
   */
  @Post('interchange/decode')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Interchange 디코딩',
    description: 'protobuf 메시지를 ValidatorPublicKeys로 디코딩합니다.',
  })
  @ApiResponse({ status: 200, type: ValidatorPublicKeysDto })
  @ApiResponse({ status: 400, description: '잘못된 protobuf 또는 필드' })
  decodeInterchange(@Body() dto: EncodedPayloadDto): ValidatorPublicKeysJSON {
    const keys = this.parse(() =>
      this.validatorService.decodeInterchange(hexToBytes(dto.data)),
    );
    return keys.toJSON();
  }

  private parse(decode: () => ValidatorPublicKeys): ValidatorPublicKeys {
    try {
      return decode();
    } catch (error) {
      if (error instanceof ValidatorPublicKeysDecodeError) {
        throw new BadRequestException({
          message: error.message,
          field: error.field ?? null,
          layer: error.layer,
        });
      }
      throw error;
    }
  }
}
