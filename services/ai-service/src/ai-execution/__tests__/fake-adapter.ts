import { AIAdapter } from '../adapters/ai-adapter.interface';
import { GenerationFailure, GenerationFailureCause } from '../../errors/generation-failure';
import { GenerationRequest } from '../types';

export type FakeAdapter = AIAdapter & {
  generate: jest.Mock<Promise<string>, [GenerationRequest]>;
};

export function succeeding(name: string, text = `${name} output`): FakeAdapter {
  return {
    name,
    model: `${name}-model`,
    generate: jest.fn<Promise<string>, [GenerationRequest]>().mockResolvedValue(text),
  };
}

export function failing(
  name: string,
  cause: GenerationFailureCause = 'transport_error',
): FakeAdapter {
  return {
    name,
    model: `${name}-model`,
    generate: jest
      .fn<Promise<string>, [GenerationRequest]>()
      .mockRejectedValue(new GenerationFailure(name, cause, `${name} is down`)),
  };
}

export function streaming(name: string, chunks: string[]): FakeAdapter {
  return {
    ...succeeding(name),
    async *streamGenerate() {
      yield* chunks;
    },
  };
}
