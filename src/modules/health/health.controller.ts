import { Controller, Get, Req } from '@nestjs/common';
import type { Request } from 'express';
import { createLogger } from '../../common/utils/logger';
import { PluginRegistry } from '../concierge/application/plugins';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  plugins: string[];
}

@Controller('health')
export class HealthController {
  private readonly logger = createLogger(HealthController.name);

  constructor(private readonly registry: PluginRegistry) {}

  @Get()
  check(@Req() req: Request): HealthResponse {
    this.logger.debug('health_check_request', {
      event: 'health_check_request',
      request_origin: req.headers.origin ?? null,
    });

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      plugins: this.registry.list().map((plugin) => plugin.name),
    };
  }
}
