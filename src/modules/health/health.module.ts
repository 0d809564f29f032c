import { Module } from '@nestjs/common';
import { ConciergeModule } from '../concierge/concierge.module';
import { HealthController } from './health.controller';

@Module({
  imports: [ConciergeModule],
  controllers: [HealthController],
})
export class HealthModule {}
