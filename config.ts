// process.env.* values are replaced at build time by the `define` block in vite.config.ts
export const config = {
  groq: {
    apiUrl: process.env.GROQ_API_URL || 'https://api.groq.com/openai/v1/chat/completions',
    model: process.env.GROQ_MODEL || 'llama3-8b-8192',
  },
} as const;

export function getGroqApiKey(): string | undefined {
  const key = process.env.GROQ_API_KEY?.trim();
  if (!key) {
    console.error("GROQ_API_KEY is not set. Add it to your .env file and restart the dev server.");
    return undefined;
  }
  return key;
}
