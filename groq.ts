import { z, ZodError } from 'zod';
import { config } from './config';
import { AnalysisError, formatZodIssues } from './errors';
import { extractAnalysis } from './extract';
import type { ChatRequest, ChatResponse, VerseAnalysis } from './types';

const SYSTEM_PROMPT = `You are a biblical analysis expert. For the given verse, generate a multi-layered analysis.

Your entire response MUST be ONLY a single JSON object.
DO NOT include any explanatory text, introduction, or markdown like \`\`\`json.
The JSON object must have the following exact structure. If a value is not available, use an empty string "" or an empty array [] instead of leaving the key out.
{
  "verse_reference": "string",
  "verse_text": "string",
  "context": "string",
  "exegesis": "string",
  "themes": "string",
  "cross_references": [
    { "reference": "string", "text": "string" }
  ]
}

Any double quote inside a string value MUST be escaped with a backslash (\\").
Do not put a comma after the last element of an object or array.`;

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string(),
        content: z.string(),
      }),
    }),
  ),
});

export interface TransportOptions {
  endpoint?: string;
  fetch?: typeof fetch;
}

export function buildChatRequest(
  verseReference: string,
  credential: string,
  model: string = config.groq.model,
): ChatRequest {
  return {
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${credential}`,
    },
    body: {
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: `Generate the analysis for: ${verseReference}` },
      ],
      model,
      temperature: 0.5,
      max_tokens: 2048,
      top_p: 1,
      stop: null,
      stream: false,
    },
  };
}

function resolveEndpoint(endpoint: string): URL {
  try {
    return new URL(endpoint);
  } catch (error) {
    throw new AnalysisError('InvalidEndpoint', `"${endpoint}" is not a valid URL.`, { cause: error });
  }
}

async function remoteErrorMessage(response: Response): Promise<string> {
  const body: unknown = await response.json().catch(() => undefined);
  const parsed = z.object({ error: z.object({ message: z.string() }) }).safeParse(body);
  return parsed.success
    ? `API Error: ${response.status} (${parsed.data.error.message})`
    : `API Error: ${response.status}`;
}

export async function sendChatRequest(
  request: ChatRequest,
  options: TransportOptions = {},
): Promise<ChatResponse> {
  const url = resolveEndpoint(options.endpoint ?? config.groq.apiUrl);
  const fetchImpl = options.fetch ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
    });
  } catch (error) {
    throw new AnalysisError(
      'TransportFailure',
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new AnalysisError('TransportFailure', await remoteErrorMessage(response));
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new AnalysisError('MalformedResponse', 'The chat response body is not valid JSON.', { cause: error });
  }

  try {
    return chatResponseSchema.parse(body);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new AnalysisError('MalformedResponse', formatZodIssues(error), { cause: error });
    }
    throw error;
  }
}

export function readChoiceContent(response: ChatResponse): string {
  const [first] = response.choices;
  if (!first) {
    throw new AnalysisError('MalformedResponse', 'The chat response contained no choices.');
  }
  return first.message.content;
}

export async function analyzeVerse(
  verseReference: string,
  credential: string | undefined,
  options: TransportOptions = {},
): Promise<VerseAnalysis> {
  if (!credential?.trim()) {
    throw new AnalysisError('MissingCredential', 'Set GROQ_API_KEY in your .env file and restart the app.');
  }

  const request = buildChatRequest(verseReference, credential);
  const response = await sendChatRequest(request, options);
  const content = readChoiceContent(response);
  console.debug('[groq] raw model response:\n', content);

  try {
    return extractAnalysis(content);
  } catch (error) {
    console.error("Could not extract an analysis from the raw response:", content);
    throw error;
  }
}
