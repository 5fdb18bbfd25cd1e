import type { TrackerSnapshot } from '../services/ChallengeTracker';

/** One console line per highlighted flight, rarest first. */
export function formatSnapshot(snapshot: TrackerSnapshot, limit: number): string[] {
  return snapshot.flights.slice(0, limit).map(flight => {
    const route = flight.origin && flight.destination
      ? `${flight.origin}->${flight.destination}`
      : flight.origin || flight.destination || '-';
    const tag = flight.challenge !== undefined ? ` [challenge ${flight.challenge}]` : '';
    return `${flight.rarity.toFixed(2)} ${flight.tier} ${flight.aircraftName} (${flight.typecode}) ` +
      `${flight.registration || '-'} ${flight.callsign || '-'} ${route}${tag}`;
  });
}
