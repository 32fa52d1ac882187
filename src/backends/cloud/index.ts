/**
 * Cloud Backend - OpenAI-compatible API
 * Works with: OpenAI, Ollama, vLLM, LMStudio, and any OpenAI-compatible endpoint
 */

export { CloudTextGenerator, parseStreamChunk } from './llm';
export type { CloudTextGeneratorConfig } from './llm';
