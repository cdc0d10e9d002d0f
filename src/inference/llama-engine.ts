import type { EngineGenerateOptions, LoadedModel, LocalEngine, ModelSpec } from './model-arena.js';

/**
 * In-process inference through node-llama-cpp. The library is imported on
 * first load so that nothing native is touched until a model is needed.
 */
export class LlamaCppEngine implements LocalEngine {
  async load(spec: ModelSpec): Promise<LoadedModel> {
    const { getLlama, LlamaCompletion } = await import('node-llama-cpp');

    const llama = await getLlama();
    const model = await llama.loadModel({ modelPath: spec.modelPath });
    const context = await model.createContext(
      spec.contextSize ? { contextSize: spec.contextSize } : {}
    );

    return {
      async generate(prompt: string, options: EngineGenerateOptions): Promise<void> {
        const sequence = context.getSequence();
        try {
          const completion = new LlamaCompletion({ contextSequence: sequence });
          await completion.generateCompletion(prompt, {
            signal: options.signal,
            maxTokens: options.maxTokens,
            onTextChunk: options.onText
          });
        } finally {
          sequence.dispose();
        }
      },

      async dispose(): Promise<void> {
        await context.dispose();
        await model.dispose();
      }
    };
  }
}
