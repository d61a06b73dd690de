import type { SalesKpis } from '@/lib/types';
import { formatCurrency, formatCurrencyCents, formatNumber } from '@/lib/formatters';

interface SalesKPICardsProps {
  kpis: SalesKpis;
}

export default function SalesKPICards({ kpis }: SalesKPICardsProps) {
  const cards = [
    {
      label: 'Total Filtered Revenue',
      value: formatCurrency(kpis.total_revenue),
      subtext: `Showing ${kpis.record_count} data points`,
      color: '#3b82f6',
    },
    {
      label: 'Total Units Sold',
      value: formatNumber(kpis.total_units),
      color: '#22c55e',
    },
    {
      label: 'Average Price per Unit',
      value: formatCurrencyCents(kpis.avg_price_per_unit),
      color: '#f59e0b',
    },
  ];

  return (
    <div className="kpi-cards">
      {cards.map((card) => (
        <div key={card.label} className="kpi-card" style={{ borderColor: card.color }}>
          <div className="kpi-value" style={{ color: card.color }}>
            {card.value}
          </div>
          <div className="kpi-label">{card.label}</div>
          {card.subtext && <div className="kpi-subtext">{card.subtext}</div>}
        </div>
      ))}
    </div>
  );
}
