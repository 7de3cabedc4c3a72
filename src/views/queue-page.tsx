import type { CountryConfig } from '../config/app-config';
import { partyInfoFor } from '../common/party';
import type { Representative } from '../modules/representatives/representative.types';
import { Layout } from './layout';
import { PartyBadge } from './party-badge';

export function QueuePage({ queue, countries }: { queue: Representative[]; countries: CountryConfig[] }) {
  const byCode = new Map(countries.map((c): [string, CountryConfig] => [c.code, c]));
  return (
    <Layout title="Queue">
      <h1 className="text-2xl font-bold mb-4">Queue ({queue.length})</h1>
      {queue.length === 0 ? (
        <p className="text-gray-500">Nobody is waiting in the queue.</p>
      ) : (
        <table className="w-full bg-white rounded-lg shadow-sm border text-sm" id="queue-table">
          <thead className="bg-gray-100 text-left">
            <tr>
              <th className="p-2">#</th>
              <th className="p-2">Name</th>
              <th className="p-2">Constituency</th>
              <th className="p-2">Party</th>
              <th className="p-2">Country</th>
            </tr>
          </thead>
          <tbody>
            {queue.map((rep, index) => {
              const country = byCode.get(rep.countryCode);
              return (
                <tr key={rep.id} className="border-t">
                  <td className="p-2 text-gray-400">{index + 1}</td>
                  <td className="p-2">{rep.personName}</td>
                  <td className="p-2">{rep.postLabel ?? ''}</td>
                  <td className="p-2"><PartyBadge party={partyInfoFor(country, rep.party)} /></td>
                  <td className="p-2">{country?.name ?? rep.countryCode}</td>
                </tr>
              );
            })}
          </tbody>
        </table>
      )}
    </Layout>
  );
}
