import React, { useEffect, useState } from 'react';
import { fetchFigure, fetchYears } from './utils/api';
import { DEFAULT_YEAR } from './constants';
import { Figure, LoadingState } from './types';
import TornadoMap from './components/TornadoMap';
import YearSelector from './components/YearSelector';

const App: React.FC = () => {
  const [years, setYears] = useState<number[]>([]);
  const [selectedYear, setSelectedYear] = useState<number>(DEFAULT_YEAR);
  const [figure, setFigure] = useState<Figure | null>(null);
  const [loadingState, setLoadingState] = useState<LoadingState>(LoadingState.IDLE);
  const [errorMessage, setErrorMessage] = useState<string>('');

  useEffect(() => {
    const controller = new AbortController();

    const loadYears = async () => {
      try {
        const { years: options, defaultYear } = await fetchYears(controller.signal);
        setYears(options);
        setSelectedYear(defaultYear);
      } catch (e) {
        if (controller.signal.aborted) return;
        console.error('Year list load failed', e);
        setErrorMessage(e instanceof Error ? e.message : 'Failed to load years');
        setLoadingState(LoadingState.ERROR);
      }
    };
    void loadYears();

    return () => controller.abort();
  }, []);

  // Rebuild the map whenever the year changes. Aborting on cleanup drops
  // answers to a year the user has already moved away from.
  useEffect(() => {
    const controller = new AbortController();

    const loadFigure = async () => {
      setLoadingState(LoadingState.LOADING);
      try {
        const next = await fetchFigure(selectedYear, controller.signal);
        setFigure(next);
        setErrorMessage('');
        setLoadingState(LoadingState.SUCCESS);
      } catch (e) {
        if (controller.signal.aborted) return;
        console.error('Figure load failed', e);
        setErrorMessage(e instanceof Error ? e.message : 'Failed to load map');
        setLoadingState(LoadingState.ERROR);
      }
    };
    void loadFigure();

    return () => controller.abort();
  }, [selectedYear]);

  return (
    <div className="min-h-screen bg-slate-950 text-slate-200 font-sans">

      {/* Header */}
      <header className="bg-slate-900/80 border-b border-slate-800 shadow-md">
        <div className="max-w-7xl mx-auto px-4 py-4">
          <h1 className="text-2xl font-bold tracking-tight text-center">US Tornado Dashboard</h1>
        </div>
      </header>

      <main className="max-w-7xl mx-auto p-4 md:p-6 space-y-4">
        <YearSelector years={years} value={selectedYear} onChange={setSelectedYear} disabled={years.length === 0} />

        {loadingState === LoadingState.ERROR && (
          <div className="bg-rose-900/30 border border-rose-800 text-rose-300 text-sm rounded-lg px-4 py-2 text-center">
            {errorMessage}
          </div>
        )}

        <TornadoMap figure={figure} loading={loadingState === LoadingState.LOADING} />
      </main>
    </div>
  );
};

export default App;
