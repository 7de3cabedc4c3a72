import { assignSeats, seatSeed } from '../../src/modules/queue/hex-assignment';

describe('Seat assignment', () => {
  const reps = [
    { personName: 'Ada Example', postLabel: 'Seat One' },
    { personName: 'Ben Example', postLabel: null },
  ];

  it('should derive the seed from the first 32 bits of the identity hash', () => {
    expect(seatSeed('alpha', 'Ada Example', 'Seat One')).toBe(698401632);
    expect(seatSeed('alpha', 'Ben Example', null)).toBe(2312941174);
  });

  it('should pick seats from the free ids in file order', () => {
    const seats = assignSeats('alpha', reps, ['A1', 'A2', 'A3']).map((a) => a.hexId);
    expect(seats).toEqual(['A1', 'A2']);
  });

  it('should be deterministic', () => {
    const first = assignSeats('alpha', reps, ['A1', 'A2', 'A3']);
    const second = assignSeats('alpha', reps, ['A1', 'A2', 'A3']);
    expect(second).toEqual(first);
  });

  it('should skip ids already in use', () => {
    const seats = assignSeats('alpha', reps, ['A1', 'A2', 'A3'], new Set(['A1'])).map((a) => a.hexId);
    expect(seats).toEqual(['A2', 'A3']);
  });

  it('should give null once the ids run out', () => {
    const seats = assignSeats('alpha', [...reps, { personName: 'Cy Overflow', postLabel: 'Seat Three' }], ['A1', 'A2']);
    expect(seats.map((a) => a.hexId)).toEqual(['A1', 'A2', null]);
    expect(seats[2].candidate.personName).toBe('Cy Overflow');
  });

  it('should never hand out the same id twice', () => {
    const many = Array.from({ length: 50 }, (_, i) => ({ personName: 'Person ' + i, postLabel: null }));
    const ids = Array.from({ length: 50 }, (_, i) => 'U' + i);
    const seats = assignSeats('zeta', many, ids).map((a) => a.hexId);
    expect(new Set(seats).size).toBe(50);
    expect(seats).not.toContain(null);
  });
});
