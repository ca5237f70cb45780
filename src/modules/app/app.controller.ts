import { Controller, Get } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { SERVICE_NAME } from './app.constants';

@ApiExcludeController()
@Controller()
export class AppController {
  @Get()
  root() {
    return { service: SERVICE_NAME };
  }
}
