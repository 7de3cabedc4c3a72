import type { CountryConfig, PartyInfo } from '../config/app-config';

const OTHER_PARTY: PartyInfo = { name: 'Other', shortName: 'Other', color: '#CCCCCC' };

export function partyInfoFor(country: CountryConfig | undefined, party: string | null): PartyInfo {
  const parties = country?.parties ?? [];
  return (
    parties.find((p) => p.name === party) ??
    parties.find((p) => p.name === OTHER_PARTY.name) ??
    OTHER_PARTY
  );
}

export function partyClass(shortName: string): string {
  return shortName.toLowerCase().replace(/ /g, '-').replace(/&/g, 'and');
}
