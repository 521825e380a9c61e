import { Controller, Get } from '@nestjs/common';
import { ConnectionRegistry, ConnectionStatistics } from './connection-registry.service';

@Controller('health')
export class HealthController {
  constructor(private readonly registry: ConnectionRegistry) {}

  @Get()
  health(): { status: 'ok'; timestamp: string; connections: ConnectionStatistics } {
    return { status: 'ok', timestamp: new Date().toISOString(), connections: this.registry.statistics() };
  }
}
