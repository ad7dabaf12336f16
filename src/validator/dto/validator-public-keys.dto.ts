import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches } from 'class-validator';

const HEX_PATTERN = /^0x([0-9a-fA-F]{2})*$/;

/**
 * ValidatorPublicKeys DTO
 *
 * 검증 규칙:
 * - 모든 필드: 0x로 시작하는 짝수 길이 hex
 * - 길이/곡선 검증은 코덱이 담당 (실패 시 400 + 필드 이름)
 */
export class ValidatorPublicKeysDto {
  @ApiProperty({
    description: '계정 주소 (0x + 32자리 hex)',
    example: '0x' + 'aa'.repeat(16),
  })
  @IsString()
  @IsNotEmpty()
  @Matches(HEX_PATTERN, {
    message: 'accountAddress must be a 0x-prefixed hex string',
  })
  accountAddress!: string;

  @ApiProperty({
    description: 'Consensus 공개키 (Ed25519, 0x + 64자리 hex)',
    example: '0x' + '00'.repeat(32),
  })
  @IsString()
  @IsNotEmpty()
  @Matches(HEX_PATTERN, {
    message: 'consensusPublicKey must be a 0x-prefixed hex string',
  })
  consensusPublicKey!: string;

  @ApiProperty({
    description: 'Network signing 공개키 (Ed25519, 0x + 64자리 hex)',
    example: '0x' + '00'.repeat(32),
  })
  @IsString()
  @IsNotEmpty()
  @Matches(HEX_PATTERN, {
    message: 'networkSigningPublicKey must be a 0x-prefixed hex string',
  })
  networkSigningPublicKey!: string;

  @ApiProperty({
    description: 'Network identity 공개키 (X25519, 0x + 64자리 hex)',
    example: '0x' + 'cc'.repeat(32),
  })
  @IsString()
  @IsNotEmpty()
  @Matches(HEX_PATTERN, {
    message: 'networkIdentityPublicKey must be a 0x-prefixed hex string',
  })
  networkIdentityPublicKey!: string;
}

/**
 * 인코딩된 바이트 요청 DTO
 */
export class EncodedPayloadDto {
  @ApiProperty({
    description: '인코딩된 바이트 (0x hex)',
    example: '0x90' + 'aa'.repeat(16),
  })
  @IsString()
  @Matches(HEX_PATTERN, {
    message: 'data must be a 0x-prefixed hex string',
  })
  data!: string;
}

/**
 * Canonical 인코딩 응답 DTO
 */
export class CanonicalEncodingResponseDto {
  @ApiProperty({ description: 'Canonical 바이트 (0x hex)' })
  encoded!: string;

  @ApiProperty({ description: 'Keccak-256(canonical bytes)' })
  hash!: string;

  @ApiProperty({
    description: '로그용 요약 (축약 주소)',
    example: 'accountAddress: aaaaaaaa',
  })
  summary!: string;
}

/**
 * Interchange 인코딩 응답 DTO
 */
export class InterchangeEncodingResponseDto {
  @ApiProperty({ description: 'protobuf 바이트 (0x hex)' })
  encoded!: string;
}
