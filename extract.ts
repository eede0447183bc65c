import { nanoid } from 'nanoid';
import { z, ZodError } from 'zod';
import { AnalysisError, formatZodIssues } from './errors';
import type { VerseAnalysis } from './types';

const optionalString = z.string().nullish();

const crossReferenceSchema = z.object({
  reference: optionalString,
  text: optionalString,
});

const analysisSchema = z.object({
  verse_reference: optionalString,
  verse_text: optionalString,
  context: optionalString,
  exegesis: optionalString,
  themes: optionalString,
  cross_references: z.array(crossReferenceSchema).nullish(),
});

/**
 * Returns the text from the first `{` to the last `}` inclusive, dropping any
 * prose or markdown fence the model wrapped around its JSON.
 */
export function sliceJsonObject(raw: string): string {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end === -1) {
    throw new AnalysisError('MalformedResponse', 'No JSON object was found in the model response.');
  }
  if (end < start) {
    throw new AnalysisError('MalformedResponse', 'The model response has no closing brace after its first opening brace.');
  }
  return raw.slice(start, end + 1);
}

/** Drops every comma that directly precedes a closing `}` or `]`. */
export function removeTrailingCommas(json: string): string {
  return json.replace(/,\s*([}\]])/g, '$1');
}

export function decodeAnalysis(json: string): VerseAnalysis {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new AnalysisError(
      'MalformedResponse',
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }

  let wire: z.infer<typeof analysisSchema>;
  try {
    wire = analysisSchema.parse(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new AnalysisError('MalformedResponse', formatZodIssues(error), { cause: error });
    }
    throw error;
  }

  // null and missing keys both become absent fields
  const verseReference = wire.verse_reference ?? undefined;
  return {
    id: verseReference ?? nanoid(),
    verseReference,
    verseText: wire.verse_text ?? undefined,
    context: wire.context ?? undefined,
    exegesis: wire.exegesis ?? undefined,
    themes: wire.themes ?? undefined,
    crossReferences: wire.cross_references?.map(ref => ({
      id: nanoid(),
      reference: ref.reference ?? undefined,
      text: ref.text ?? undefined,
    })),
  };
}

export function extractAnalysis(raw: string): VerseAnalysis {
  return decodeAnalysis(removeTrailingCommas(sliceJsonObject(raw)));
}
