import type { CountryConfig } from '../config/app-config';

export function CountryTabs({ base, countries, active }: { base: string; countries: CountryConfig[]; active: string }) {
  const tabs = [...countries.map((c) => ({ code: c.code, label: c.flag + ' ' + c.name })), { code: 'overall', label: 'Overall' }];
  return (
    <div className="flex gap-2 mb-4 text-sm">
      {tabs.map((tab) => (
        <a
          key={tab.code}
          href={base + '/' + tab.code}
          className={tab.code === active ? 'px-3 py-1 rounded bg-indigo-900 text-white' : 'px-3 py-1 rounded bg-white border hover:bg-gray-100'}
        >
          {tab.label}
        </a>
      ))}
    </div>
  );
}
