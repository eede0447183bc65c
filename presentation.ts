import type { AnalysisTab, CrossReference, VerseAnalysis } from './types';

export const FALLBACK = {
  reference: 'Unknown Reference',
  verseText: 'No text provided.',
  context: 'No context provided.',
  exegesis: 'No exegesis provided.',
  themes: 'No themes provided.',
  crossReferenceTitle: 'N/A',
  crossReferenceText: '...',
  noCrossReferences: 'No cross-references were provided for this verse.',
} as const;

export const ANALYSIS_TABS: ReadonlyArray<{ id: AnalysisTab; label: string; title: string }> = [
  { id: 'context', label: 'Context', title: 'Historical & Literary Context' },
  { id: 'exegesis', label: 'Exegesis', title: 'Exegesis (Direct Interpretation)' },
  { id: 'themes', label: 'Themes', title: 'Theological Themes' },
  { id: 'crossRef', label: 'Cross-Ref', title: 'Illuminating Cross-References' },
];

export type AnalysisSection =
  | { kind: 'text'; title: string; content: string }
  | { kind: 'references'; title: string; references: { id: string; reference: string; text: string }[] };

export function headerFor(analysis: VerseAnalysis): { reference: string; verseText: string } {
  return {
    reference: analysis.verseReference ?? FALLBACK.reference,
    verseText: analysis.verseText ?? FALLBACK.verseText,
  };
}

function titleOf(tab: AnalysisTab): string {
  return ANALYSIS_TABS.find(t => t.id === tab)?.title ?? '';
}

function displayReference(ref: CrossReference) {
  return {
    id: ref.id,
    reference: ref.reference ?? FALLBACK.crossReferenceTitle,
    text: ref.text ?? FALLBACK.crossReferenceText,
  };
}

export function sectionFor(analysis: VerseAnalysis, tab: AnalysisTab): AnalysisSection {
  const title = titleOf(tab);
  switch (tab) {
    case 'context':
      return { kind: 'text', title, content: analysis.context ?? FALLBACK.context };
    case 'exegesis':
      return { kind: 'text', title, content: analysis.exegesis ?? FALLBACK.exegesis };
    case 'themes':
      return { kind: 'text', title, content: analysis.themes ?? FALLBACK.themes };
    case 'crossRef':
      return { kind: 'references', title, references: (analysis.crossReferences ?? []).map(displayReference) };
  }
}
