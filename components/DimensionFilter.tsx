'use client';

interface DimensionFilterProps<T extends string> {
  label: string;
  allLabel: string;
  options: readonly T[];
  selected: T[];
  onChange: (selected: T[]) => void;
}

/**
 * Multi-select button group for one categorical dimension
 * An empty selection means "all"; removing the last value goes back to all
 */
export default function DimensionFilter<T extends string>({
  label,
  allLabel,
  options,
  selected,
  onChange,
}: DimensionFilterProps<T>) {
  const isAllSelected = selected.length === 0 || selected.length === options.length;

  const handleClick = (value: T) => {
    let next: T[];
    if (selected.includes(value)) {
      next = selected.filter(v => v !== value);
    } else {
      next = [...selected.filter(v => options.includes(v)), value];
    }

    // Every option selected is the same as no filter
    onChange(next.length === options.length ? [] : next);
  };

  return (
    <div className="filter-group">
      <span className="filter-label">{label}</span>
      <div className="filter-buttons">
        <button
          className={`filter-btn ${isAllSelected ? 'active' : ''}`}
          onClick={() => onChange([])}
        >
          {allLabel}
        </button>
        {options.map(option => (
          <button
            key={option}
            className={`filter-btn ${!isAllSelected && selected.includes(option) ? 'active' : ''}`}
            onClick={() => handleClick(option)}
          >
            {option}
          </button>
        ))}
      </div>
    </div>
  );
}
