import { Module } from '@nestjs/common';
import { InsightsModule } from '../insights/insights.module';
import { AIController } from './ai.controller';

@Module({
  imports: [InsightsModule],
  controllers: [AIController],
})
export class AIModule {}
