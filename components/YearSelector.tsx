import React from 'react';

interface YearSelectorProps {
  years: number[];
  value: number;
  onChange: (year: number) => void;
  disabled?: boolean;
}

const YearSelector: React.FC<YearSelectorProps> = ({ years, value, onChange, disabled = false }) => {
  return (
    <div className="flex items-center justify-center gap-3 p-2.5">
      <label htmlFor="year-dropdown" className="text-sm font-medium text-slate-300">
        Select Year:
      </label>
      <select
        id="year-dropdown"
        value={value}
        disabled={disabled}
        onChange={(e) => onChange(Number(e.target.value))}
        className="w-[150px] bg-slate-950 border border-slate-700 rounded-lg px-2 py-1.5 text-sm text-slate-200 font-mono outline-none focus:border-cyan-500"
      >
        {years.map(year => (
          <option key={year} value={year}>
            {year}
          </option>
        ))}
      </select>
    </div>
  );
};

export default YearSelector;
