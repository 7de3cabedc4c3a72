export type RepresentativeStatus = 'queued' | 'prayed';

export interface Representative {
  id: number;
  countryCode: string;
  personName: string;
  party: string;
  postLabel: string | null;
  hexId: string | null;
  thumbnail: string | null;
  status: RepresentativeStatus;
  prayedAt: string | null;
  prayedSeq: number | null;
  addedAt: string;
}

export type NewRepresentative = Pick<Representative, 'countryCode' | 'personName' | 'party' | 'postLabel' | 'hexId' | 'thumbnail'>;

export interface RepresentativeRow {
  id: number;
  country_code: string;
  person_name: string;
  party: string;
  post_label: string | null;
  hex_id: string | null;
  thumbnail: string | null;
  status: RepresentativeStatus;
  prayed_at: string | null;
  prayed_seq: number | null;
  added_at: string;
}

export function toRepresentative(row: RepresentativeRow): Representative {
  return {
    id: row.id,
    countryCode: row.country_code,
    personName: row.person_name,
    party: row.party,
    postLabel: row.post_label,
    hexId: row.hex_id,
    thumbnail: row.thumbnail,
    status: row.status,
    prayedAt: row.prayed_at,
    prayedSeq: row.prayed_seq,
    addedAt: row.added_at,
  };
}

/** Key used to match a roster row against an already stored representative. */
export function identityKey(personName: string, postLabel: string | null): string {
  return personName + '|' + (postLabel ?? '');
}
