import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"type":"done","result":"mock"}';

/**
 * Mock LLM provider for testing and dry runs.
 * Cycles through provided canned responses, falling back to a default.
 * A response that is an Error instance is thrown instead of returned.
 */
export function createMockClient(
  responses?: ReadonlyArray<string | Error>,
): LLMClient & { readonly calls: number } {
  let callIndex = 0;

  return {
    get calls(): number {
      return callIndex;
    },

    async generate(): Promise<string> {
      const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
      callIndex++;
      if (response instanceof Error) throw response;
      return response;
    },
  };
}
