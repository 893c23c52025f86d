/**
 * repodoc public API
 */

export { analyze, prepare, type PipelineContext, type PreparedRun } from './core/pipeline.js';
export { FileWalker, collectFiles, type FileWalkerOptions } from './core/analyzer/file-walker.js';
export {
  classifyLanguages,
  detectLanguage,
  dominantLanguages,
} from './core/analyzer/language-classifier.js';
export { selectKeyFiles, type KeyFileSelectorOptions } from './core/analyzer/key-file-selector.js';
export { sampleContent, type ContentSamplerOptions } from './core/analyzer/content-sampler.js';
export {
  assemblePrompt,
  instructionTemplate,
  type PromptAssemblerOptions,
} from './core/generator/prompt-assembler.js';
export {
  GenerationOrchestrator,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
} from './core/generator/generation-orchestrator.js';
export { writeDocument, withFooter } from './core/generator/readme-writer.js';
export {
  AnthropicProvider,
  BackendError,
  MockLLMProvider,
  OpenAIProvider,
  createProvider,
  type BackendErrorKind,
  type CompletionRequest,
  type CompletionResponse,
  type LLMProvider,
} from './core/services/llm-service.js';
export {
  loadConfig,
  resolveProviderConfig,
  writeDefaultConfig,
  type LoadedConfig,
  type RepodocConfig,
} from './core/services/config-manager.js';
export { RepodocError, errors, isRepodocError, type ErrorCode } from './utils/errors.js';
export type * from './types/index.js';
