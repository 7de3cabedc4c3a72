import type { CountryConfig } from '../config/app-config';
import { Layout } from './layout';

export function AboutPage({ countries }: { countries: CountryConfig[] }) {
  return (
    <Layout title="About">
      <div className="bg-white rounded-lg shadow-sm border p-6 space-y-4">
        <h1 className="text-2xl font-bold">About PrayReps</h1>
        <p>
          PrayReps puts the elected representatives of {countries.map((c) => c.name).join(' and ')} in a queue and
          invites you to pray for them one at a time.
        </p>
        <p>
          Each hexagon on the map stands for one seat. Seats of representatives already prayed for carry a heart,
          and the seat of the next person in the queue is highlighted in yellow.
        </p>
        <p className="text-sm text-gray-500">
          Pressing "Amen" records the prayer and moves the queue on. Prayers can be undone from the prayed list.
        </p>
      </div>
    </Layout>
  );
}
