import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { AIExecutionService } from '../ai-execution/ai-execution.service';
import { extractJsonArray, extractJsonObject, JsonExtraction } from './json-extraction';
import {
  customerResponsePrompt,
  dealInsightsPrompt,
  intentPrompt,
  nextActionsPrompt,
  sentimentPrompt,
  summaryPrompt,
} from './prompts';
import {
  DealInsightsSchema,
  IntentExtraction,
  IntentSchema,
  NextAction,
  NextActionListSchema,
  SentimentAnalysis,
  SentimentSchema,
} from './schemas';
import {
  ConversationMessage,
  CustomerSentiment,
  CustomerSnapshot,
  DealInsights,
  DealSnapshot,
  ResponseTone,
} from './types';

/** Returned when the response carries no JSON object at all */
export const SENTIMENT_NO_JSON: SentimentAnalysis = {
  sentiment: 'neutral',
  confidence: 0.5,
  emotions: [],
  tone: 'unclear',
};

/** Returned when a JSON object is present but unusable */
export const SENTIMENT_UNPARSEABLE: SentimentAnalysis = {
  sentiment: 'neutral',
  confidence: 0,
  emotions: [],
  tone: 'error',
};

export const INTENT_FALLBACK: IntentExtraction = {
  primary_intent: 'unknown',
  confidence: 0,
  entities: {},
  action_required: 'clarify',
};

export const SUMMARY_MAX_MESSAGES = 50;
export const CUSTOMER_SENTIMENT_MAX_CHARS = 2000;

/**
 * InsightsService
 *
 * Higher-level operations built as prompt templates over a single
 * AIExecutionService.generate() call each.
 *
 * Generation failures (NoProvidersAvailable, AllProvidersFailed) propagate
 * unchanged. Only parse failures of the model output are turned into
 * neutral results.
 */
@Injectable()
export class InsightsService {
  private readonly logger = new Logger(InsightsService.name);

  constructor(private readonly aiExecution: AIExecutionService) {}

  async analyzeSentiment(text: string): Promise<SentimentAnalysis> {
    const { response } = await this.aiExecution.generate({
      prompt: sentimentPrompt(text),
      temperature: 0.3,
    });

    const extraction = extractJsonObject(response);
    if (extraction.status === 'absent') {
      return { ...SENTIMENT_NO_JSON, emotions: [] };
    }

    return (
      this.validate('sentiment', extraction, SentimentSchema) ?? {
        ...SENTIMENT_UNPARSEABLE,
        emotions: [],
      }
    );
  }

  async extractIntent(text: string): Promise<IntentExtraction> {
    const { response } = await this.aiExecution.generate({
      prompt: intentPrompt(text),
      temperature: 0.3,
    });

    return (
      this.validate('intent', extractJsonObject(response), IntentSchema) ?? {
        ...INTENT_FALLBACK,
        entities: {},
      }
    );
  }

  /**
   * Draft a reply to a customer. The generated text is returned verbatim.
   */
  async generateResponse(
    customerMessage: string,
    tone: ResponseTone = 'professional',
    context?: Record<string, unknown>,
  ): Promise<string> {
    const { response } = await this.aiExecution.generate({
      prompt: customerResponsePrompt(customerMessage, tone, context),
      temperature: 0.8,
    });
    return response;
  }

  /**
   * 2-3 sentence summary of the most recent messages.
   */
  async summarizeConversation(messages: readonly ConversationMessage[]): Promise<string> {
    const recent = messages.slice(-SUMMARY_MAX_MESSAGES);
    const { response } = await this.aiExecution.generate({
      prompt: summaryPrompt(recent),
      temperature: 0.5,
      maxTokens: 200,
    });
    return response;
  }

  async getDealInsights(deal: DealSnapshot): Promise<DealInsights> {
    const { response } = await this.aiExecution.generate({
      prompt: dealInsightsPrompt(deal),
      temperature: 0.5,
    });

    const insights = this.validate('deal insights', extractJsonObject(response), DealInsightsSchema);
    if (!insights) {
      return { error: 'Could not parse AI response', raw_response: response };
    }

    return {
      ...insights,
      context: {
        deal: {
          title: deal.title,
          value: deal.value,
          stage: deal.stage,
          probability: deal.probability,
        },
        customer: {
          name: deal.customerName ?? 'Unknown',
          status: deal.customerStatus ?? 'Unknown',
        },
        recent_interactions: deal.recentInteractions,
      },
    };
  }

  async suggestNextActions(customer: CustomerSnapshot): Promise<NextAction[]> {
    const { response } = await this.aiExecution.generate({
      prompt: nextActionsPrompt(customer),
      temperature: 0.7,
    });

    return this.validate('next actions', extractJsonArray(response), NextActionListSchema) ?? [];
  }

  /**
   * Sentiment over a customer's recent incoming messages, joined and truncated.
   * An empty history short-circuits without a generation call.
   */
  async analyzeCustomerSentiment(messages: readonly string[]): Promise<CustomerSentiment> {
    const contents = messages.filter((content) => content.length > 0);
    if (contents.length === 0) {
      return {
        sentiment: 'neutral',
        confidence: 0,
        emotions: [],
        tone: 'no recent messages',
        message_count: 0,
      };
    }

    const combined = contents.join('\n').slice(0, CUSTOMER_SENTIMENT_MAX_CHARS);
    const sentiment = await this.analyzeSentiment(combined);

    return { ...sentiment, message_count: contents.length };
  }

  private validate<T>(
    operation: string,
    extraction: JsonExtraction,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T | undefined {
    if (extraction.status === 'absent') {
      this.logger.warn(`No JSON found in ${operation} response`);
      return undefined;
    }
    if (extraction.status === 'malformed') {
      this.logger.warn(`Malformed JSON in ${operation} response: ${extraction.error}`);
      return undefined;
    }

    const result = schema.safeParse(extraction.value);
    if (!result.success) {
      this.logger.warn(
        `Unexpected ${operation} shape: ${result.error.issues.map((issue) => issue.message).join(', ')}`,
      );
      return undefined;
    }
    return result.data;
  }
}
