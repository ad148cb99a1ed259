import { Module } from '@nestjs/common';
import { AIExecutionModule } from '../ai-execution/ai-execution.module';
import { InsightsService } from './insights.service';

@Module({
  imports: [AIExecutionModule],
  providers: [InsightsService],
  exports: [InsightsService, AIExecutionModule],
})
export class InsightsModule {}
