import { Module } from '@nestjs/common';
import { ValidatorModule } from './validator/validator.module';

/**
 * AppModule
 *
 * 애플리케이션의 루트 모듈
 *
 * Feature Modules:
 * - ValidatorModule: ValidatorPublicKeys 인코딩/디코딩
 */
@Module({
  imports: [ValidatorModule],
  controllers: [],
  providers: [],
})
export class AppModule {}
