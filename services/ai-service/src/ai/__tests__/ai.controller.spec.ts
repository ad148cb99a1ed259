import { Test, TestingModule } from '@nestjs/testing';
import { MessageEvent, ValidationPipe } from '@nestjs/common';
import { lastValueFrom, toArray } from 'rxjs';
import { AIController } from '../ai.controller';
import { GenerateDto, StreamGenerateQueryDto } from '../dto/generate.dto';
import { AIExecutionService } from '../../ai-execution/ai-execution.service';
import { InsightsService } from '../../insights/insights.service';
import { GenerationStream } from '../../ai-execution/types';
import { NoProvidersAvailableException } from '../../errors/no-providers-available.exception';

async function* chunksOf(...parts: string[]): AsyncIterable<string> {
  for (const part of parts) {
    yield part;
  }
}

describe('AIController', () => {
  let controller: AIController;
  let aiExecution: {
    generate: jest.Mock;
    stream: jest.Mock<GenerationStream>;
    getProviderInfo: jest.Mock;
    checkHealth: jest.Mock;
  };
  let insights: {
    analyzeSentiment: jest.Mock;
    extractIntent: jest.Mock;
    generateResponse: jest.Mock;
    summarizeConversation: jest.Mock;
    getDealInsights: jest.Mock;
    suggestNextActions: jest.Mock;
    analyzeCustomerSentiment: jest.Mock;
  };

  beforeEach(async () => {
    aiExecution = {
      generate: jest.fn(),
      stream: jest.fn(),
      getProviderInfo: jest.fn(),
      checkHealth: jest.fn(),
    };
    insights = {
      analyzeSentiment: jest.fn(),
      extractIntent: jest.fn(),
      generateResponse: jest.fn(),
      summarizeConversation: jest.fn(),
      getDealInsights: jest.fn(),
      suggestNextActions: jest.fn(),
      analyzeCustomerSentiment: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AIController],
      providers: [
        { provide: AIExecutionService, useValue: aiExecution },
        { provide: InsightsService, useValue: insights },
      ],
    }).compile();

    controller = module.get(AIController);
  });

  describe('POST /ai/generate', () => {
    it('should map the body onto a generation request', async () => {
      aiExecution.generate.mockResolvedValue({
        response: 'Hi!',
        provider: 'groq',
        model: 'llama-3.1-70b-versatile',
      });

      const result = await controller.generate({
        prompt: 'Say hi',
        provider: 'groq',
        temperature: 0.2,
        max_tokens: 64,
        system_prompt: 'Be brief.',
      });

      expect(result).toEqual({ response: 'Hi!', provider: 'groq', model: 'llama-3.1-70b-versatile' });
      expect(aiExecution.generate).toHaveBeenCalledWith({
        prompt: 'Say hi',
        provider: 'groq',
        temperature: 0.2,
        maxTokens: 64,
        systemPrompt: 'Be brief.',
      });
    });

    it('should pass a temperature above 2 through validation to the router', async () => {
      const pipe = new ValidationPipe({ whitelist: true, transform: true });
      const body: GenerateDto = await pipe.transform(
        { prompt: 'hi', temperature: 2.5 },
        { type: 'body', metatype: GenerateDto },
      );
      aiExecution.generate.mockResolvedValue({
        response: 'ok',
        provider: 'openai',
        model: 'gpt-4-turbo',
      });

      await controller.generate(body);

      expect(aiExecution.generate).toHaveBeenCalledWith({
        prompt: 'hi',
        provider: undefined,
        temperature: 2.5,
        maxTokens: 1000,
        systemPrompt: undefined,
      });
    });

    it('should let router exceptions propagate', async () => {
      aiExecution.generate.mockRejectedValue(new NoProvidersAvailableException());

      await expect(controller.generate({ prompt: 'Say hi' })).rejects.toBeInstanceOf(
        NoProvidersAvailableException,
      );
    });
  });

  describe('GET /ai/generate/stream', () => {
    it('should emit chunk events followed by a done event', async () => {
      aiExecution.stream.mockReturnValue({
        provider: 'openai',
        model: 'gpt-4-turbo',
        chunks: chunksOf('Hel', 'lo'),
      });

      const events: MessageEvent[] = await lastValueFrom(
        controller.streamGenerate({ prompt: 'Say hello' }).pipe(toArray()),
      );

      expect(events).toEqual([
        { data: { type: 'chunk', content: 'Hel' } },
        { data: { type: 'chunk', content: 'lo' } },
        { data: { type: 'done', provider: 'openai', model: 'gpt-4-turbo' } },
      ]);
      expect(aiExecution.stream).toHaveBeenCalledWith({
        prompt: 'Say hello',
        provider: undefined,
        temperature: undefined,
        maxTokens: undefined,
      });
    });
  });

  describe('stream query validation', () => {
    it('should convert and keep an out-of-range temperature from the query string', async () => {
      const pipe = new ValidationPipe({ whitelist: true, transform: true });

      const query: StreamGenerateQueryDto = await pipe.transform(
        { prompt: 'hi', temperature: '3' },
        { type: 'query', metatype: StreamGenerateQueryDto },
      );

      expect(query.temperature).toBe(3);
    });
  });

  describe('POST /ai/generate-response', () => {
    it('should default the tone to professional and echo it', async () => {
      insights.generateResponse.mockResolvedValue('Thanks for writing in.');

      const result = await controller.generateResponse({ customer_message: 'Hello?' });

      expect(result).toEqual({ response: 'Thanks for writing in.', tone: 'professional' });
      expect(insights.generateResponse).toHaveBeenCalledWith('Hello?', 'professional', undefined);
    });
  });

  describe('POST /ai/summarize-conversation', () => {
    it('should report the number of submitted messages', async () => {
      insights.summarizeConversation.mockResolvedValue('Short summary.');
      const messages = [
        { sender: 'Customer', content: 'Hi' },
        { sender: 'Agent', content: 'Hello' },
      ];

      await expect(controller.summarizeConversation({ messages })).resolves.toEqual({
        summary: 'Short summary.',
        message_count: 2,
      });
    });
  });

  describe('POST /ai/deal-insights', () => {
    it('should translate the body into a deal snapshot', async () => {
      insights.getDealInsights.mockResolvedValue({
        error: 'Could not parse AI response',
        raw_response: 'n/a',
      });

      await controller.dealInsights({
        title: 'Renewal',
        value: 5000,
        stage: 'proposal',
        probability: 0.4,
        customer_name: 'Acme Ltd',
      });

      expect(insights.getDealInsights).toHaveBeenCalledWith({
        title: 'Renewal',
        value: 5000,
        stage: 'proposal',
        probability: 0.4,
        customerName: 'Acme Ltd',
        customerStatus: undefined,
        recentInteractions: 0,
      });
    });
  });

  describe('POST /ai/next-actions', () => {
    it('should translate the body into a customer snapshot', async () => {
      insights.suggestNextActions.mockResolvedValue([]);

      await expect(
        controller.nextActions({ name: 'Dana', status: 'lead', recent_messages: 3 }),
      ).resolves.toEqual([]);
      expect(insights.suggestNextActions).toHaveBeenCalledWith({
        name: 'Dana',
        status: 'lead',
        company: undefined,
        recentMessages: 3,
        lastContactDate: undefined,
      });
    });
  });

  describe('text analysis routes', () => {
    it('should pass the text through to sentiment and intent', async () => {
      insights.analyzeSentiment.mockResolvedValue({
        sentiment: 'positive',
        confidence: 0.9,
        emotions: [],
        tone: 'warm',
      });
      insights.extractIntent.mockResolvedValue({
        primary_intent: 'greeting',
        confidence: 0.8,
        entities: {},
        action_required: 'reply',
      });

      await controller.analyzeSentiment({ text: 'Great work' });
      await controller.extractIntent({ text: 'Hello there' });
      await controller.customerSentiment({ messages: ['a', 'b'] });

      expect(insights.analyzeSentiment).toHaveBeenCalledWith('Great work');
      expect(insights.extractIntent).toHaveBeenCalledWith('Hello there');
      expect(insights.analyzeCustomerSentiment).toHaveBeenCalledWith(['a', 'b']);
    });
  });

  describe('GET /ai/providers and /ai/health', () => {
    it('should return router introspection', async () => {
      const info = {
        available_providers: ['ollama'],
        default_provider: 'ollama',
        total_providers: 1,
      };
      aiExecution.getProviderInfo.mockReturnValue(info);
      aiExecution.checkHealth.mockResolvedValue({
        ...info,
        status: 'healthy',
        default_provider_status: 'healthy',
      });

      expect(controller.providers()).toEqual(info);
      await expect(controller.health()).resolves.toEqual({
        ...info,
        status: 'healthy',
        default_provider_status: 'healthy',
      });
    });
  });
});
