import {
  AIProvidersConfig,
  AUTO_PROVIDER,
  ProviderName,
  ProviderSettings,
} from '../ai-execution/types';
import { GROQ_BASE_URL } from '../ai-execution/adapters/groq-ai.adapter';

/**
 * AI provider configuration
 *
 * Environment keys per backend. A backend is configured only when its
 * credential is present and non-blank; Ollama needs none and is on
 * unless OLLAMA_ENABLED=false.
 */

/** Hosted APIs */
export const HOSTED_TIMEOUT_MS = 30000;

/** Local inference is much slower than hosted APIs */
export const LOCAL_TIMEOUT_MS = 120000;

export type ConfigReader = (key: string) => string | undefined;

function present(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readTimeout(read: ConfigReader, key: string, fallback: number): number {
  const raw = present(read(key));
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function hosted(
  read: ConfigReader,
  prefix: string,
  defaultModel: string,
  extras: Partial<ProviderSettings> = {},
): ProviderSettings | undefined {
  const apiKey = present(read(`${prefix}_API_KEY`));
  if (!apiKey) {
    return undefined;
  }
  return {
    apiKey,
    model: present(read(`${prefix}_MODEL`)) ?? defaultModel,
    timeoutMs: readTimeout(read, `${prefix}_TIMEOUT_MS`, HOSTED_TIMEOUT_MS),
    ...extras,
  };
}

/**
 * Build the typed provider configuration from raw configuration values.
 *
 * @param read - Lookup for a single key, typically ConfigService.get
 */
export function loadAIProvidersConfig(read: ConfigReader): AIProvidersConfig {
  const providers: Partial<Record<ProviderName, ProviderSettings>> = {};

  const openai = hosted(read, 'OPENAI', 'gpt-4-turbo', {
    organization: present(read('OPENAI_ORG_ID')),
    baseUrl: present(read('OPENAI_BASE_URL')),
  });
  if (openai) providers.openai = openai;

  const claude = hosted(read, 'ANTHROPIC', 'claude-3-5-sonnet-20240620', {
    baseUrl: present(read('ANTHROPIC_BASE_URL')),
  });
  if (claude) providers.claude = claude;

  const gemini = hosted(read, 'GOOGLE', 'gemini-1.5-flash');
  if (gemini) providers.gemini = gemini;

  const groq = hosted(read, 'GROQ', 'llama-3.1-70b-versatile', {
    baseUrl: present(read('GROQ_BASE_URL')) ?? GROQ_BASE_URL,
  });
  if (groq) providers.groq = groq;

  if (present(read('OLLAMA_ENABLED'))?.toLowerCase() !== 'false') {
    providers.ollama = {
      baseUrl: present(read('OLLAMA_BASE_URL')) ?? 'http://localhost:11434',
      model: present(read('OLLAMA_MODEL')) ?? 'llama3:8b',
      timeoutMs: readTimeout(read, 'OLLAMA_TIMEOUT_MS', LOCAL_TIMEOUT_MS),
    };
  }

  return {
    defaultProvider: present(read('DEFAULT_AI_PROVIDER'))?.toLowerCase() ?? AUTO_PROVIDER,
    providers,
  };
}
