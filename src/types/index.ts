export const BOOKING_STATUSES = ["Confirmed", "Complete", "Cancelled"] as const;

export type BookingStatus = (typeof BOOKING_STATUSES)[number];

// Valid state transitions, enforced by the store on every status change
export const VALID_TRANSITIONS: Record<BookingStatus, BookingStatus[]> = {
  Confirmed: ["Complete", "Cancelled"],
  Complete: [],
  Cancelled: [],
};

// bookingId and status are owned by the store: absent on requests, always set once stored
export interface Booking {
  bookingId?: number;
  customerId: number;
  roomTypeId: number;
  checkInDate: string;
  checkOutDate: string;
  status?: BookingStatus;
}

export type StoredBooking = Booking & {
  bookingId: number;
  status: BookingStatus;
};

export type CreateBookingResult =
  | { ok: true; booking: StoredBooking }
  | { ok: false; reason: "server-owned-fields" | "unavailable" };

export const MAX_CUSTOMER_ID = 0xffffffff;
export const MAX_BOOKING_ID = 0xffffffff;
export const MAX_ROOM_TYPE_ID = 0xff;
