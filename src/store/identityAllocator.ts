// Bookings are never removed, so the maximum id only grows and "max + 1" never
// hands out an id twice. A deletion feature would need a persisted counter instead.
export function nextBookingId(existingIds: Iterable<number>): number {
  let max = 0;
  for (const id of existingIds) {
    if (id > max) max = id;
  }
  return max + 1;
}
