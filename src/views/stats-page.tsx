import type { CountryConfig } from '../config/app-config';
import type { PartyStat } from '../modules/stats/stats.service';
import { CountryTabs } from './country-tabs';
import { Layout } from './layout';
import { PartyBadge } from './party-badge';

const chartScript = (countryCode: string) => `
(function () {
  var code = ${JSON.stringify(countryCode)};
  Promise.all([
    fetch('/stats/data/' + code).then(function (r) { return r.json(); }),
    fetch('/stats/timedata/' + code).then(function (r) { return r.json(); })
  ]).then(function (results) {
    var parties = results[0];
    var time = results[1];
    new Chart(document.getElementById('party-chart'), {
      type: 'bar',
      data: { labels: Object.keys(parties), datasets: [{ label: 'Prayed for', data: Object.values(parties) }] }
    });
    new Chart(document.getElementById('time-chart'), {
      type: 'line',
      data: {
        labels: time.timestamps.map(function (t) { return new Date(t).toLocaleString(); }),
        datasets: [{ label: time.country_name, data: time.timestamps.map(function (_, i) { return i + 1; }) }]
      }
    });
  });
})();
`;

export interface StatsPageProps {
  countryCode: string;
  title: string;
  countries: CountryConfig[];
  parties: PartyStat[];
  totalPrayed: number;
}

export function StatsPage(props: StatsPageProps) {
  return (
    <Layout title={'Statistics: ' + props.title}>
      <h1 className="text-2xl font-bold mb-4">Statistics: {props.title}</h1>
      <CountryTabs base="/stats" countries={props.countries} active={props.countryCode} />
      <p className="mb-4 text-gray-600">
        Prayed for so far: <span className="font-semibold" data-stat="total-prayed">{props.totalPrayed}</span>
      </p>
      {props.parties.length > 0 && (
        <table id="party-stats" className="w-full bg-white rounded-lg shadow-sm border text-sm mb-6">
          <tbody>
            {props.parties.map((p) => (
              <tr key={p.shortName} className={'border-t party-' + p.cssClass}>
                <td className="p-2"><PartyBadge party={p} /></td>
                <td className="p-2">{p.name}</td>
                <td className="p-2 text-right font-semibold">{p.count}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
      <div className="grid md:grid-cols-2 gap-6">
        <canvas id="party-chart"></canvas>
        <canvas id="time-chart"></canvas>
      </div>
      <script src="https://cdn.jsdelivr.net/npm/chart.js@4.4.1/dist/chart.umd.min.js"></script>
      <script dangerouslySetInnerHTML={{ __html: chartScript(props.countryCode) }} />
    </Layout>
  );
}
