import { createHash } from 'crypto';

export interface SeatCandidate {
  personName: string;
  postLabel: string | null;
}

export interface SeatAssignment<T extends SeatCandidate> {
  candidate: T;
  hexId: string | null;
}

/** First 32 bits of SHA-256 over the representative's identity within a country. */
export function seatSeed(countryCode: string, personName: string, postLabel: string | null): number {
  const digest = createHash('sha256')
    .update(countryCode + ':' + personName + '|' + (postLabel ?? ''))
    .digest();
  return digest.readUInt32BE(0);
}

/**
 * Deals the free polygon ids out to candidates in order. Deterministic: the
 * same ids, used set and candidates always give the same seats. Candidates
 * left over once the ids run out get `null`.
 */
export function assignSeats<T extends SeatCandidate>(
  countryCode: string,
  candidates: T[],
  unitIds: string[],
  usedIds: ReadonlySet<string> = new Set(),
): SeatAssignment<T>[] {
  const available = unitIds.filter((id) => !usedIds.has(id));
  return candidates.map((candidate) => {
    if (available.length === 0) return { candidate, hexId: null };
    const index = seatSeed(countryCode, candidate.personName, candidate.postLabel) % available.length;
    const [hexId] = available.splice(index, 1);
    return { candidate, hexId };
  });
}
