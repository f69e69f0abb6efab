import { BookingStatus, VALID_TRANSITIONS } from "../types";

/**
 * Whether a booking in `from` may move to `to`.
 * Only Confirmed bookings move, and only to Complete or Cancelled.
 */
export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: BookingStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
