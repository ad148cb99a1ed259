export * from './ai-adapter.interface';
export * from './tokens';
export * from './failure-classifier';
export * from './openai-ai.adapter';
export * from './anthropic-ai.adapter';
export * from './gemini-ai.adapter';
export * from './groq-ai.adapter';
export * from './ollama-ai.adapter';
