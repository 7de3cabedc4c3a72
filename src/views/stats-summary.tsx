import type { QueueSummary } from '../modules/queue/queue.service';

export function StatsSummary({ summary, oob = false }: { summary: QueueSummary; oob?: boolean }) {
  const cells = [
    { label: 'Remaining', value: summary.remaining, key: 'remaining' },
    { label: 'In queue', value: summary.queueSize, key: 'queue-size' },
    { label: 'Prayed for', value: summary.totalPrayed, key: 'total-prayed' },
  ];
  return (
    <div id="stats-summary-container" hx-swap-oob={oob ? 'true' : undefined} className="grid grid-cols-3 gap-4">
      {cells.map((cell) => (
        <div key={cell.key} className="bg-white rounded-lg shadow-sm border p-4 text-center">
          <div className="text-2xl font-bold text-indigo-900" data-stat={cell.key}>{cell.value}</div>
          <div className="text-xs text-gray-500">{cell.label}</div>
        </div>
      ))}
    </div>
  );
}
