import type { PartyInfo } from '../config/app-config';
import { partyClass } from '../common/party';

export function PartyBadge({ party }: { party: PartyInfo }) {
  return (
    <span className={'party-' + partyClass(party.shortName) + ' inline-flex items-center gap-1 text-xs font-medium'}>
      <span className="inline-block w-3 h-3 rounded-full border" style={{ backgroundColor: party.color }}></span>
      {party.shortName}
    </span>
  );
}
