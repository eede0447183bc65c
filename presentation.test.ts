import { describe, expect, it } from 'vitest';
import { AnalysisError, describeAnalysisError } from './errors';
import { ANALYSIS_TABS, FALLBACK, headerFor, sectionFor } from './presentation';
import type { VerseAnalysis } from './types';

const empty: VerseAnalysis = { id: 'empty' };

describe('headerFor', () => {
  it('falls back when reference and text are absent', () => {
    expect(headerFor(empty)).toEqual({ reference: 'Unknown Reference', verseText: 'No text provided.' });
  });

  it('shows an empty string as given', () => {
    expect(headerFor({ id: 'x', verseReference: '', verseText: 'In the beginning' })).toEqual({
      reference: '',
      verseText: 'In the beginning',
    });
  });
});

describe('sectionFor', () => {
  it('lists the tabs in display order', () => {
    expect(ANALYSIS_TABS.map(t => t.label)).toEqual(['Context', 'Exegesis', 'Themes', 'Cross-Ref']);
  });

  it('uses the fallback text for each missing section', () => {
    expect(sectionFor(empty, 'context')).toEqual({
      kind: 'text',
      title: 'Historical & Literary Context',
      content: 'No context provided.',
    });
    expect(sectionFor(empty, 'exegesis')).toEqual({
      kind: 'text',
      title: 'Exegesis (Direct Interpretation)',
      content: 'No exegesis provided.',
    });
    expect(sectionFor(empty, 'themes')).toEqual({
      kind: 'text',
      title: 'Theological Themes',
      content: 'No themes provided.',
    });
  });

  it('turns missing cross references into an empty list', () => {
    expect(sectionFor(empty, 'crossRef')).toEqual({
      kind: 'references',
      title: 'Illuminating Cross-References',
      references: [],
    });
  });

  it('fills missing cross reference fields', () => {
    const section = sectionFor({ id: 'x', crossReferences: [{ id: 'r1', text: 'Love is patient' }, { id: 'r2', reference: '1 John 4:8' }] }, 'crossRef');
    expect(section).toEqual({
      kind: 'references',
      title: 'Illuminating Cross-References',
      references: [
        { id: 'r1', reference: FALLBACK.crossReferenceTitle, text: 'Love is patient' },
        { id: 'r2', reference: '1 John 4:8', text: '...' },
      ],
    });
  });
});

describe('describeAnalysisError', () => {
  it('explains a missing key', () => {
    expect(describeAnalysisError(new AnalysisError('MissingCredential', 'Set GROQ_API_KEY.'))).toBe('API Key not found. Set GROQ_API_KEY.');
  });

  it('mentions punctuation for malformed responses', () => {
    expect(describeAnalysisError(new AnalysisError('MalformedResponse', 'themes: Expected string, received number'))).toBe(
      'Failed to parse the analysis. Complex punctuation in the verse text, such as quotation marks, can cause this. ' +
      'Please try again.\n\nError: themes: Expected string, received number',
    );
  });

  it('includes the transport error', () => {
    expect(describeAnalysisError(new AnalysisError('TransportFailure', 'fetch failed'))).toBe(
      'Could not reach the analysis service. Error: fetch failed',
    );
  });

  it('describes errors from outside the pipeline', () => {
    expect(describeAnalysisError(new Error('boom'))).toBe('Failed to generate analysis. Error: boom');
  });
});
