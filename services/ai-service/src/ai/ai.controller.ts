import { Body, Controller, Get, MessageEvent, Post, Query, Sse } from '@nestjs/common';
import { Observable, concat, from, map, of } from 'rxjs';
import { AIExecutionService } from '../ai-execution/ai-execution.service';
import { ProviderHealth, ProviderInfo } from '../ai-execution/types';
import { InsightsService } from '../insights/insights.service';
import { IntentExtraction, NextAction, SentimentAnalysis } from '../insights/schemas';
import { CustomerSentiment, DealInsights } from '../insights/types';
import { GenerateDto, GenerateResponseDto, StreamGenerateQueryDto } from './dto/generate.dto';
import { TextAnalysisDto } from './dto/text-analysis.dto';
import { CustomerResponseDto } from './dto/customer-response.dto';
import { ConversationSummaryDto } from './dto/conversation-summary.dto';
import { CustomerSentimentDto, DealInsightsDto, NextActionsDto } from './dto/crm-insights.dto';

/**
 * AIController
 *
 * Thin transport over AIExecutionService and InsightsService. Router
 * exceptions are HttpExceptions and map to 502/503 responses unchanged.
 */
@Controller('ai')
export class AIController {
  constructor(
    private readonly aiExecution: AIExecutionService,
    private readonly insights: InsightsService,
  ) {}

  @Post('generate')
  async generate(@Body() body: GenerateDto): Promise<GenerateResponseDto> {
    return this.aiExecution.generate({
      prompt: body.prompt,
      provider: body.provider,
      temperature: body.temperature,
      maxTokens: body.max_tokens,
      systemPrompt: body.system_prompt,
    });
  }

  @Sse('generate/stream')
  streamGenerate(@Query() query: StreamGenerateQueryDto): Observable<MessageEvent> {
    const stream = this.aiExecution.stream({
      prompt: query.prompt,
      provider: query.provider,
      temperature: query.temperature,
      maxTokens: query.max_tokens,
    });

    return concat(
      from(stream.chunks).pipe(
        map((content): MessageEvent => ({ data: { type: 'chunk', content } })),
      ),
      of<MessageEvent>({
        data: { type: 'done', provider: stream.provider, model: stream.model },
      }),
    );
  }

  @Post('sentiment')
  async analyzeSentiment(@Body() body: TextAnalysisDto): Promise<SentimentAnalysis> {
    return this.insights.analyzeSentiment(body.text);
  }

  @Post('intent')
  async extractIntent(@Body() body: TextAnalysisDto): Promise<IntentExtraction> {
    return this.insights.extractIntent(body.text);
  }

  @Post('generate-response')
  async generateResponse(@Body() body: CustomerResponseDto) {
    const tone = body.tone ?? 'professional';
    const response = await this.insights.generateResponse(
      body.customer_message,
      tone,
      body.context,
    );
    return { response, tone };
  }

  @Post('summarize-conversation')
  async summarizeConversation(@Body() body: ConversationSummaryDto) {
    const summary = await this.insights.summarizeConversation(body.messages);
    return { summary, message_count: body.messages.length };
  }

  @Post('deal-insights')
  async dealInsights(@Body() body: DealInsightsDto): Promise<DealInsights> {
    return this.insights.getDealInsights({
      title: body.title,
      value: body.value,
      stage: body.stage,
      probability: body.probability,
      customerName: body.customer_name,
      customerStatus: body.customer_status,
      recentInteractions: body.recent_interactions ?? 0,
    });
  }

  @Post('next-actions')
  async nextActions(@Body() body: NextActionsDto): Promise<NextAction[]> {
    return this.insights.suggestNextActions({
      name: body.name,
      status: body.status,
      company: body.company,
      recentMessages: body.recent_messages ?? 0,
      lastContactDate: body.last_contact_date,
    });
  }

  @Post('customer-sentiment')
  async customerSentiment(@Body() body: CustomerSentimentDto): Promise<CustomerSentiment> {
    return this.insights.analyzeCustomerSentiment(body.messages);
  }

  @Get('providers')
  providers(): ProviderInfo {
    return this.aiExecution.getProviderInfo();
  }

  @Get('health')
  async health(): Promise<ProviderHealth> {
    return this.aiExecution.checkHealth();
  }
}
