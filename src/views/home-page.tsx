import type { CountryConfig } from '../config/app-config';
import type { QueueSummary } from '../modules/queue/queue.service';
import type { Representative } from '../modules/representatives/representative.types';
import { CurrentItemPanel } from './current-item';
import { Layout } from './layout';
import { MapPanel } from './map-panel';
import { StatsSummary } from './stats-summary';

export interface HomePageProps {
  current: Representative | null;
  country?: CountryConfig;
  mapCountryName: string;
  mapImagePath: string | null;
  summary: QueueSummary;
}

export function HomePage(props: HomePageProps) {
  return (
    <Layout title="Pray">
      <div className="grid md:grid-cols-2 gap-6">
        <div className="space-y-6">
          <CurrentItemPanel current={props.current} country={props.country} />
          <StatsSummary summary={props.summary} />
          <form method="post" action="/purge" className="text-right">
            <button type="submit" className="text-xs text-gray-400 hover:text-red-600">Reset the queue</button>
          </form>
        </div>
        <MapPanel countryName={props.mapCountryName} mapImagePath={props.mapImagePath} />
      </div>
    </Layout>
  );
}
