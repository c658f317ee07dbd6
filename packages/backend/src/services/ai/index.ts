// Gemini client
export { gemini_embed, generate_with_flash, is_ai_available } from './gemini.js';

// Embedding gateway
export {
  create_embedding_gateway,
  type EmbeddingGateway,
  type EmbeddingGatewayOptions,
  type EmbeddingProvider,
  type EmbedOptions,
} from './embeddings.js';

// Answer composition
export { compose_answer, build_answer_prompt, FALLBACK_ANSWER } from './answer.js';
