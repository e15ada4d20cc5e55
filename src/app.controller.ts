import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Public } from './common/decorators/public.decorator';

@Controller()
export class AppController {
  constructor(private readonly config: ConfigService) {}

  @Public()
  @Get('health')
  health(): { status: 'healthy'; version: string } {
    return {
      status: 'healthy',
      version: this.config.get<string>('app.version', '2.1.0'),
    };
  }
}
