import { DealInsightsPayload, SentimentAnalysis } from './schemas';

export const RESPONSE_TONES = ['professional', 'friendly', 'casual', 'formal'] as const;
export type ResponseTone = (typeof RESPONSE_TONES)[number];

export interface ConversationMessage {
  sender?: string;
  content?: string;
}

/**
 * Deal fields needed for insight prompts. Loaded by the caller; this layer
 * does no persistence.
 */
export interface DealSnapshot {
  title: string;
  value: number;
  stage: string;
  /** 0.0-1.0 */
  probability: number;
  customerName?: string;
  customerStatus?: string;
  recentInteractions: number;
}

export interface CustomerSnapshot {
  name: string;
  status: string;
  company?: string;
  recentMessages: number;
  lastContactDate?: string;
}

export interface DealInsightsContext {
  deal: { title: string; value: number; stage: string; probability: number };
  customer: { name: string; status: string };
  recent_interactions: number;
}

export type DealInsights =
  | (DealInsightsPayload & { context: DealInsightsContext })
  | { error: string; raw_response: string };

export type CustomerSentiment = SentimentAnalysis & { message_count: number };
