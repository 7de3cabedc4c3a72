import type { CountryConfig, PartyInfo } from '../config/app-config';
import { CountryTabs } from './country-tabs';
import { Layout } from './layout';
import { PartyBadge } from './party-badge';

export interface PrayedRow {
  id: number;
  personName: string;
  postLabel: string | null;
  countryCode: string;
  countryName: string;
  party: PartyInfo;
  prayedAtLabel: string;
}

export function PrayedTable({ rows, countryCode, showCountry = false }: { rows: PrayedRow[]; countryCode: string; showCountry?: boolean }) {
  if (rows.length === 0) {
    return (
      <div id="prayed-list-table" className="text-gray-500">
        Nobody has been prayed for yet.
      </div>
    );
  }
  return (
    <table id="prayed-list-table" data-country={countryCode} className="w-full bg-white rounded-lg shadow-sm border text-sm">
      <thead className="bg-gray-100 text-left">
        <tr>
          <th className="p-2">Name</th>
          <th className="p-2">Constituency</th>
          <th className="p-2">Party</th>
          {showCountry && <th className="p-2">Country</th>}
          <th className="p-2">Prayed</th>
          {!showCountry && <th className="p-2"></th>}
        </tr>
      </thead>
      <tbody>
        {rows.map((row) => (
          <tr key={row.id} className="border-t" data-representative-id={row.id}>
            <td className="p-2">{row.personName}</td>
            <td className="p-2">{row.postLabel ?? ''}</td>
            <td className="p-2" style={{ borderLeft: '4px solid ' + row.party.color }}>
              <PartyBadge party={row.party} />
            </td>
            {showCountry && <td className="p-2">{row.countryName}</td>}
            <td className="p-2 text-gray-500">{row.prayedAtLabel}</td>
            {!showCountry && (
              <td className="p-2 text-right">
                <form
                  method="post"
                  action="/prayer/put-back-form"
                  hx-post="/prayer/put-back"
                  hx-target="#prayed-list-table"
                  hx-swap="outerHTML"
                >
                  <input type="hidden" name="id" value={row.id} />
                  <input type="hidden" name="person_name" value={row.personName} />
                  <input type="hidden" name="post_label" value={row.postLabel ?? ''} />
                  <input type="hidden" name="country_code" value={row.countryCode} />
                  <button type="submit" className="text-xs text-indigo-700 hover:underline">Put back</button>
                </form>
              </td>
            )}
          </tr>
        ))}
      </tbody>
    </table>
  );
}

export function PrayedPage(props: { rows: PrayedRow[]; countryCode: string; title: string; countries: CountryConfig[] }) {
  const overall = props.countryCode === 'overall';
  return (
    <Layout title={'Prayed for: ' + props.title}>
      <h1 className="text-2xl font-bold mb-4">Prayed for: {props.title}</h1>
      <CountryTabs base="/prayed" countries={props.countries} active={props.countryCode} />
      <PrayedTable rows={props.rows} countryCode={props.countryCode} showCountry={overall} />
    </Layout>
  );
}
