import { ConversationMessage, CustomerSnapshot, DealSnapshot, ResponseTone } from './types';

export function sentimentPrompt(text: string): string {
  return `Analyze the sentiment of the following text and respond with JSON only:

Text: ${text}

Respond with this exact JSON structure:
{
    "sentiment": "positive/negative/neutral",
    "confidence": 0.0-1.0,
    "emotions": ["emotion1", "emotion2"],
    "tone": "description of tone"
}`;
}

export function intentPrompt(text: string): string {
  return `Extract the intent from the following text and respond with JSON only:

Text: ${text}

Respond with this exact JSON structure:
{
    "primary_intent": "intent_name",
    "confidence": 0.0-1.0,
    "entities": {"entity_type": "entity_value"},
    "action_required": "suggested action"
}`;
}

export function customerResponsePrompt(
  customerMessage: string,
  tone: ResponseTone,
  context?: Record<string, unknown>,
): string {
  const contextLine = context ? `\nContext: ${JSON.stringify(context)}` : '';

  return `Generate a ${tone} response to the following customer message:${contextLine}

Customer Message: ${customerMessage}

Generate a helpful, ${tone} response:`;
}

export function transcript(messages: readonly ConversationMessage[]): string {
  return messages
    .map((message) => `${message.sender || 'User'}: ${message.content ?? ''}`)
    .join('\n');
}

export function summaryPrompt(messages: readonly ConversationMessage[]): string {
  return `Summarize the following conversation in 2-3 sentences:

${transcript(messages)}

Summary:`;
}

const currency = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function dealInsightsPrompt(deal: DealSnapshot): string {
  return `Analyze this sales deal and provide insights:

Deal Information:
- Title: ${deal.title}
- Value: $${currency.format(deal.value)}
- Stage: ${deal.stage}
- Probability: ${Math.round(deal.probability * 100)}%
- Customer: ${deal.customerName ?? 'Unknown'}
- Recent Interactions: ${deal.recentInteractions}

Provide:
1. Risk factors (1-3 bullet points)
2. Opportunities (1-3 bullet points)
3. Next best action
4. Estimated close likelihood

Format as JSON:
{
    "risk_factors": ["risk1", "risk2"],
    "opportunities": ["opp1", "opp2"],
    "next_action": "action description",
    "close_likelihood": "high/medium/low"
}`;
}

export function nextActionsPrompt(customer: CustomerSnapshot): string {
  return `Based on this customer information, suggest 3 specific next actions:

Customer: ${customer.name}
Status: ${customer.status}
Company: ${customer.company || 'N/A'}
Recent messages: ${customer.recentMessages}
Last contact: ${customer.lastContactDate || 'Never'}

Provide 3 actionable suggestions as JSON:
[
    {
        "action": "Action title",
        "description": "Why this action",
        "priority": "high/medium/low",
        "estimated_time": "X minutes"
    }
]`;
}
