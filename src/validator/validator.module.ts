import { Module } from '@nestjs/common';
import { ValidatorController } from './validator.controller';
import { ValidatorService } from './validator.service';

/**
 * Validator Module
 *
 * ValidatorPublicKeys 코덱
 *
 * 구성:
 * - ValidatorService: canonical / interchange 인코딩, 디코딩, 해시
 * - ValidatorController: 인코딩/디코딩 API
 */
@Module({
  controllers: [ValidatorController],
  providers: [ValidatorService],
  exports: [ValidatorService],
})
export class ValidatorModule {}
