export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const BASE_URL_ENV_VAR = 'BASE_URL'; // Any OpenAI-compatible endpoint (e.g. Groq)
export const MODEL_NAME_ENV_VAR = 'MODEL_NAME';
export const DEFAULT_MODEL_NAME = 'gpt-3.5-turbo'; // General default
export const MODEL_TEMPERATURE = 0.7;
export const MAX_COMPLETION_TOKENS = 2048;
