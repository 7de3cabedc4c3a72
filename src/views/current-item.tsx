import type { CountryConfig } from '../config/app-config';
import { partyInfoFor } from '../common/party';
import type { Representative } from '../modules/representatives/representative.types';
import { PartyBadge } from './party-badge';

function initials(name: string): string {
  return name
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .slice(0, 2)
    .map((part) => part[0].toUpperCase())
    .join('');
}

export function CurrentItemPanel({ current, country }: { current: Representative | null; country?: CountryConfig }) {
  if (!current) {
    return (
      <div id="main-interaction-content" className="bg-white rounded-lg shadow-sm border p-6 text-center">
        <h2 className="text-xl font-semibold mb-2">The queue is empty</h2>
        <p className="text-gray-500 text-sm">Everyone has been prayed for. Thank you!</p>
      </div>
    );
  }

  return (
    <div id="main-interaction-content" className="bg-white rounded-lg shadow-sm border p-6">
      <div className="flex items-start gap-4">
        {current.thumbnail ? (
          <img src={current.thumbnail} alt={current.personName} className="w-20 h-20 rounded-full object-cover" />
        ) : (
          <div className="w-20 h-20 bg-gray-200 rounded-full flex items-center justify-center text-2xl text-gray-400">
            {initials(current.personName)}
          </div>
        )}
        <div>
          <p className="text-sm text-gray-500">Please pray for</p>
          <h2 className="text-2xl font-bold" data-representative-id={current.id}>{current.personName}</h2>
          <p className="text-gray-600">
            {current.postLabel ?? 'No constituency'}, {country ? country.flag + ' ' + country.name : current.countryCode}
          </p>
          <PartyBadge party={partyInfoFor(country, current.party)} />
        </div>
      </div>
      <form
        method="post"
        action="/prayer/process-form"
        hx-post="/prayer/process"
        hx-target="#main-interaction-content"
        hx-swap="outerHTML"
        className="mt-6"
      >
        <input type="hidden" name="id" value={current.id} />
        <button type="submit" className="bg-indigo-700 hover:bg-indigo-800 text-white font-semibold px-6 py-2 rounded">
          Amen
        </button>
      </form>
    </div>
  );
}
