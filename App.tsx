import React, { useMemo, useState } from 'react';
import { getGroqApiKey } from './config';
import type { TransportOptions } from './groq';
import { ANALYSIS_TABS, FALLBACK, headerFor, sectionFor } from './presentation';
import type { AnalysisTab, VerseAnalysis } from './types';
import { useVerseAnalysis } from './useVerseAnalysis';

const AnalysisTextView: React.FC<{ title: string; content: string }> = ({ title, content }) => (
  <div className="space-y-3">
    <h3 className="text-xs font-black uppercase tracking-[0.2em] text-slate-400">{title}</h3>
    <p className="text-slate-700 text-base whitespace-pre-wrap leading-loose font-medium">{content}</p>
  </div>
);

const CrossReferenceListView: React.FC<{
  title: string;
  references: { id: string; reference: string; text: string }[];
}> = ({ title, references }) => (
  <div className="space-y-3">
    <h3 className="text-xs font-black uppercase tracking-[0.2em] text-slate-400">{title}</h3>
    {references.length === 0 ? (
      <p className="p-4 bg-slate-100 rounded-xl text-center text-slate-500 text-sm font-bold">{FALLBACK.noCrossReferences}</p>
    ) : (
      <ul className="space-y-2">
        {references.map(ref => (
          <li key={ref.id} className="p-4 bg-slate-100 rounded-xl">
            <p className="font-black text-slate-800 text-sm">{ref.reference}</p>
            <p className="text-slate-500 text-xs leading-relaxed">{ref.text}</p>
          </li>
        ))}
      </ul>
    )}
  </div>
);

export const AnalysisDetail: React.FC<{ analysis: VerseAnalysis }> = ({ analysis }) => {
  const [selectedTab, setSelectedTab] = useState<AnalysisTab>('context');
  const header = headerFor(analysis);
  const section = sectionFor(analysis, selectedTab);

  return (
    <div className="flex flex-col">
      <header className="bg-slate-50 p-6 border-b border-slate-200">
        <h2 className="text-4xl font-black text-slate-900 serif italic tracking-tighter">{header.reference}</h2>
        <p className="mt-3 text-lg italic text-slate-500">"{header.verseText}"</p>
      </header>

      <div role="tablist" aria-label="Analysis Lens" className="grid grid-cols-4 gap-2 p-4">
        {ANALYSIS_TABS.map(tab => (
          <button
            key={tab.id}
            type="button"
            role="tab"
            aria-selected={selectedTab === tab.id}
            onClick={() => setSelectedTab(tab.id)}
            className={`py-2 rounded-xl border-2 font-black text-xs transition-all ${selectedTab === tab.id ? 'border-indigo-600 bg-indigo-50 text-indigo-700' : 'border-slate-100 text-slate-400 hover:border-slate-200'}`}
          >
            {tab.label}
          </button>
        ))}
      </div>

      <div role="tabpanel" className="px-4 pb-6">
        {section.kind === 'text'
          ? <AnalysisTextView title={section.title} content={section.content} />
          : <CrossReferenceListView title={section.title} references={section.references} />}
      </div>
    </div>
  );
};

const App: React.FC<{ credential?: string; transport?: TransportOptions }> = ({ credential, transport }) => {
  // Looked up once; the pipeline only ever sees the value passed in.
  const apiKey = useMemo(() => credential ?? getGroqApiKey(), [credential]);
  const [verseInput, setVerseInput] = useState('John 3:16');
  const { state, analyze, retry, loading } = useVerseAnalysis(apiKey, transport);

  const handleAnalyze = async (e: React.FormEvent) => {
    e.preventDefault();
    await analyze(verseInput);
  };

  return (
    <div className="min-h-screen flex flex-col bg-white">
      <nav className="border-b border-slate-200 px-4 py-4 text-center">
        <h1 className="text-lg font-black text-slate-800 tracking-tighter">Verse Explorer</h1>
      </nav>

      <form onSubmit={handleAnalyze} className="flex gap-3 p-4 border-b border-slate-200">
        <input
          type="text"
          aria-label="Verse reference"
          placeholder="Enter a verse (e.g., Romans 8:28)"
          className="flex-1 px-4 py-3 rounded-xl border-2 border-slate-100 bg-slate-50 focus:border-indigo-600 focus:bg-white outline-none transition-all font-bold"
          value={verseInput}
          onChange={(e) => setVerseInput(e.target.value)}
        />
        <button
          type="submit"
          disabled={!verseInput.trim() || loading}
          className="px-6 py-3 rounded-xl bg-indigo-600 text-white font-black text-sm uppercase tracking-widest hover:bg-indigo-700 transition disabled:opacity-40"
        >
          Analyze
        </button>
      </form>

      <main className="flex-1">
        {(() => {
          switch (state.status) {
            case 'idle':
              return (
                <div className="py-24 text-center text-slate-400">
                  <i className="fa-solid fa-book-bible text-4xl"></i>
                  <p className="mt-4 font-bold text-sm">Enter a verse and tap 'Analyze' to begin.</p>
                </div>
              );
            case 'loading':
              return (
                <div className="py-24 text-center">
                  <div className="inline-block w-12 h-12 border-4 border-indigo-600 border-t-transparent rounded-full animate-spin mb-4"></div>
                  <p className="text-slate-500 font-bold uppercase tracking-widest text-[10px]">Generating Analysis...</p>
                </div>
              );
            case 'success':
              return <AnalysisDetail key={state.analysis.id} analysis={state.analysis} />;
            case 'error':
              return (
                <div role="alert" className="py-16 px-6 text-center">
                  <i className="fa-solid fa-triangle-exclamation text-4xl text-red-500"></i>
                  <h2 className="mt-4 font-black text-slate-800">An Error Occurred</h2>
                  <p className="mt-2 text-xs text-slate-500 whitespace-pre-wrap">{state.message}</p>
                  <button
                    type="button"
                    onClick={() => { void retry(); }}
                    className="mt-6 px-6 py-2 rounded-xl bg-slate-100 hover:bg-slate-200 text-slate-700 font-bold text-sm transition"
                  >
                    Try Again
                  </button>
                </div>
              );
          }
        })()}
      </main>
    </div>
  );
};

export default App;
