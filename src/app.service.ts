import { Injectable } from '@nestjs/common';
import { UltralyticsConfigService } from './inference/ultralytics-config.service';

export interface HealthStatus {
  status: 'ok';
  inferenceConfigured: boolean;
}

@Injectable()
export class AppService {
  constructor(private readonly ultralyticsConfig: UltralyticsConfigService) {}

  getHealth(): HealthStatus {
    return {
      status: 'ok',
      inferenceConfigured: this.ultralyticsConfig.isConfigured(),
    };
  }
}
