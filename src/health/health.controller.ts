import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Controller('health')
export class HealthController {
  constructor(private readonly config: ConfigService) {}

  @Get()
  check(): { status: 'ok'; projectId: string; timestamp: string } {
    return {
      status: 'ok',
      projectId: this.config.getOrThrow<string>('gemini.projectId'),
      timestamp: new Date().toISOString(),
    };
  }
}
