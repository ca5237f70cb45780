import { Controller, Get, Header } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { SERVICE_NAME } from '../app/app.constants';

export type HealthDto = {
  status: 'healthy';
  service: string;
  timestamp: string;
};

@ApiTags('health')
@Controller('health')
export class HealthController {
  // Liveness only: SMTP reachability is not probed.
  @Get()
  @Header('Cache-Control', 'no-store')
  health(): HealthDto {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
    };
  }
}
