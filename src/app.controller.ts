import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AppService, HealthStatus } from './app.service';
import { RelaxedThrottle } from './common/decorators/throttle.decorator';

@Controller()
@ApiTags('Health')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  @RelaxedThrottle()
  getHealth(): HealthStatus {
    return this.appService.getHealth();
  }
}
