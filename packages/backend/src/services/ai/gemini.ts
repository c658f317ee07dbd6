import { GoogleGenerativeAI } from '@google/generative-ai';
import { config } from '../../config.js';

let gen_ai: GoogleGenerativeAI | null = null;

function get_gen_ai(): GoogleGenerativeAI {
  if (!config.gemini_api_key) {
    throw new Error('GEMINI_API_KEY environment variable is not set');
  }

  if (!gen_ai) {
    gen_ai = new GoogleGenerativeAI(config.gemini_api_key);
  }

  return gen_ai;
}

// Raw embedding call; output shape is checked by the gateway, not here
export async function gemini_embed(text: string, signal: AbortSignal): Promise<unknown> {
  const embedding_model = get_gen_ai().getGenerativeModel({
    model: config.gemini_embedding_model,
  });
  const result = await embedding_model.embedContent(text, { signal });
  return result.embedding?.values;
}

export async function generate_with_flash(prompt: string, signal?: AbortSignal): Promise<string> {
  const model = get_gen_ai().getGenerativeModel({
    model: config.gemini_flash_model,
  });
  const result = await model.generateContent(prompt, signal ? { signal } : undefined);
  return result.response.text();
}

export function is_ai_available(): boolean {
  if (process.env.AI_ENABLED === 'false') {
    return false;
  }
  return config.gemini_api_key.length > 0;
}
