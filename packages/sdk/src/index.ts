// public api for @plotline/sdk
// usage:
//   import { defineTemplate, renderPrompt } from '@plotline/sdk';
//   const article = defineTemplate({ id: 'article', stages: [...] });

export * from './types';
export { defineTemplate, DEFAULT_RETRY_POLICY } from './template';
export type { TemplateSpec, StageSpec, GenerationStageSpec, UserInputStageSpec, TransformStageSpec } from './template';
export { renderPrompt, extractReferences, PromptRenderError } from './prompt';
export type { PromptReferences, RenderContext } from './prompt';
export { serialize, deserialize, SerializationError } from './utils/serialization';
