import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { DEFAULT_TIMEOUT_MS } from './constants/inference-params';
import { UltralyticsConfigService } from './ultralytics-config.service';
import { UltralyticsInferenceService } from './ultralytics-inference.service';

@Module({
  imports: [
    HttpModule.register({
      timeout: DEFAULT_TIMEOUT_MS,
      maxRedirects: 5,
    }),
    ConfigModule,
  ],
  providers: [UltralyticsConfigService, UltralyticsInferenceService],
  exports: [UltralyticsConfigService, UltralyticsInferenceService],
})
export class InferenceModule {}
