/**
 * Structured-output extraction
 *
 * Models wrap JSON in prose or code fences. The span from the first opening
 * delimiter to the last closing one is taken and parsed as JSON.
 */

export type JsonExtraction =
  | { status: 'parsed'; value: unknown }
  | { status: 'absent' }
  | { status: 'malformed'; error: string };

function extractSpan(text: string, open: string, close: string): JsonExtraction {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);

  if (start === -1 || end <= start) {
    return { status: 'absent' };
  }

  try {
    return { status: 'parsed', value: JSON.parse(text.slice(start, end + 1)) };
  } catch (error) {
    return {
      status: 'malformed',
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/** First `{` to last `}` */
export function extractJsonObject(text: string): JsonExtraction {
  return extractSpan(text, '{', '}');
}

/** First `[` to last `]` */
export function extractJsonArray(text: string): JsonExtraction {
  return extractSpan(text, '[', ']');
}
